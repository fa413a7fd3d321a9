#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigLoader, WorkflowConfig } from './core/config';
import { createStepContext } from './core/context';
import { ConfigError, WorkflowError, logError } from './core/errors';
import { ConsoleLogger, WorkflowLogger, isLogLevel } from './core/logger';
import { OrchestrationResult } from './core/models';
import { PromptManager } from './core/prompt-manager';
import { loadEvalCases } from './eval/cases';
import { formatStepValidationFailure } from './eval/step-validator';
import { formatEvalResult, runEvalSuite } from './eval/suite';
import { bootstrap, createInstructionStore, createWorkflow, getPackageRoot } from './shell/bootstrap';

const EXIT_SUCCESS = 0;
const EXIT_GENERAL_ERROR = 1;
const EXIT_CONFIG_ERROR = 2;
const EXIT_EVAL_FAILURE = 4;

const PackageJsonSchema = z.object({ version: z.string() });
const pkg = PackageJsonSchema.parse(fs.readJsonSync(path.join(getPackageRoot(), 'package.json')));

// A type alias, so it satisfies commander's OptionValues index signature
type GlobalOptions = {
    configDir: string;
    logLevel?: string;
};

const program = new Command();

program
    .name('warranty-flow')
    .description('Step-by-step LLM workflow for warranty-claim emails')
    .version(pkg.version)
    .option('--config-dir <dir>', 'Directory containing warranty.config.json', process.cwd())
    .option('--log-level <level>', 'debug | info | warn | error | silent');

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function createLogger(config?: WorkflowConfig): WorkflowLogger {
    const requested = program.opts<GlobalOptions>().logLevel ?? process.env.LOG_LEVEL;
    if (isLogLevel(requested)) return new ConsoleLogger(requested);
    return new ConsoleLogger(config?.logging.level ?? 'info');
}

async function loadConfig(): Promise<WorkflowConfig> {
    return new ConfigLoader(path.resolve(program.opts<GlobalOptions>().configDir)).load();
}

function exitOnError(error: unknown, logger: WorkflowLogger): never {
    if (error instanceof Error) {
        logError(logger, error);
    } else {
        logger.error(`[ERROR] ${String(error)}`);
    }
    process.exit(error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_GENERAL_ERROR);
}

function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new WorkflowError(`Expected a positive integer, got '${value}'`, 'cli_invalid_argument');
    }
    return parsed;
}

function printResult(result: OrchestrationResult, logger: WorkflowLogger): void {
    logger.info(`\nRun ${result.runId}`);
    result.trace.forEach((entry, i) => {
        const next = entry.ok ? entry.nextStep : 'unparseable reply';
        const reason = entry.fields.reason ? `  (${entry.fields.reason})` : '';
        logger.info(`  ${i + 1}. ${entry.stepId} → ${next}${reason}`);
    });
    logger.info(`Status:   ${result.status} at ${result.terminalStep}`);
    logger.info(`Serial:   ${result.context.serialNumber ?? '-'}`);
    logger.info(`Warranty: ${result.context.warrantyResult ?? '-'}`);
    logger.info(`Ticket:   ${result.context.ticketId ?? '-'}`);
    if (result.error) {
        logError(logger, result.error);
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// INIT COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('init')
    .description('Create warranty.config.json and copy the default step instructions')
    .action(async () => {
        const logger = createLogger();
        try {
            await bootstrap(path.resolve(program.opts<GlobalOptions>().configDir), logger);
        } catch (error) {
            exitOnError(error, logger);
        }
    });

// ═══════════════════════════════════════════════════════════════════════════
// RUN COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('run <email-file>')
    .description('Process one email (plain text file) through the configured workflow')
    .option('--email-id <id>', 'Email identifier (defaults to the file name)')
    .option('--entry <step>', 'Entry step id')
    .option('--max-steps <n>', 'Step ceiling for this run', parsePositiveInt)
    .option('--timeout <ms>', 'Abort the run after this many milliseconds', parsePositiveInt)
    .option('--json', 'Print the result as JSON')
    .action(async (emailFile: string, options: { emailId?: string; entry?: string; maxSteps?: number; timeout?: number; json?: boolean }) => {
        let logger = createLogger();
        try {
            const config = await loadConfig();
            logger = createLogger(config);

            const emailPath = path.resolve(emailFile);
            if (!await fs.pathExists(emailPath)) {
                throw new WorkflowError(`Email file not found: ${emailPath}`, 'email_file_not_found');
            }
            const content = await fs.readFile(emailPath, 'utf-8');

            const { runner } = createWorkflow(config, { logger });

            const controller = new AbortController();
            const onSigint = () => controller.abort(new Error('Interrupted by SIGINT'));
            process.once('SIGINT', onSigint);

            let result: OrchestrationResult;
            try {
                result = await runner.run({
                    context: createStepContext({
                        emailId: options.emailId ?? path.basename(emailPath, path.extname(emailPath)),
                        emailContent: content,
                    }),
                    entryStep: options.entry,
                    maxSteps: options.maxSteps,
                    timeoutMs: options.timeout,
                    signal: controller.signal,
                });
            } finally {
                process.removeListener('SIGINT', onSigint);
            }

            if (options.json) {
                console.log(JSON.stringify({
                    ...result,
                    error: result.error ? { code: result.error.code, message: result.error.message } : undefined,
                    trace: result.trace.map(entry => ({ ...entry, error: entry.error?.message })),
                }, null, 2));
            } else {
                printResult(result, logger);
            }

            process.exit(result.status === 'completed' ? EXIT_SUCCESS : EXIT_GENERAL_ERROR);
        } catch (error) {
            exitOnError(error, logger);
        }
    });

// ═══════════════════════════════════════════════════════════════════════════
// EVAL COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('eval [cases-dir]')
    .description('Run eval cases with scripted model replies and check step sequences')
    .action(async (casesDir?: string) => {
        let logger = createLogger();
        try {
            const config = await loadConfig();
            logger = createLogger(config);

            const cases = await loadEvalCases(casesDir ? path.resolve(casesDir) : config.eval.casesDir);
            // Run output is noise here; only the per-case summary is printed
            const runLogger = new ConsoleLogger('error');
            const summary = await runEvalSuite(cases, {
                config,
                instructions: createInstructionStore(config, runLogger),
                renderer: new PromptManager(config.prompts.dir),
                logger: runLogger,
            });

            summary.results.forEach(result => {
                logger.info(formatEvalResult(result));
                if (!result.validation.passed) {
                    logger.info(formatStepValidationFailure(result.validation));
                }
            });
            logger.info(`\n${summary.passed}/${summary.total} passed (${summary.passRate.toFixed(1)}%, threshold ${config.eval.passThreshold}%)`);

            process.exit(summary.meetsThreshold ? EXIT_SUCCESS : EXIT_EVAL_FAILURE);
        } catch (error) {
            exitOnError(error, logger);
        }
    });

// ═══════════════════════════════════════════════════════════════════════════
// STEPS COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('steps')
    .description('List step instruction documents')
    .action(async () => {
        let logger = createLogger();
        try {
            const config = await loadConfig();
            logger = createLogger(config);

            const steps = await createInstructionStore(config, logger).list();
            if (steps.length === 0) {
                logger.warn(`No instructions found in ${config.instructions.dir}`);
                return;
            }
            logger.info(`Instructions in ${config.instructions.dir}:`);
            steps.forEach(step => logger.info(`  ${step === config.entryStep ? '*' : ' '} ${step}`));
        } catch (error) {
            exitOnError(error, logger);
        }
    });

program.parseAsync(process.argv).catch(error => {
    console.error(error);
    process.exit(EXIT_GENERAL_ERROR);
});
