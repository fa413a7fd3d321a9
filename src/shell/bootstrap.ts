/**
 * SHELL: Bootstrap
 * Project scaffolding (`warranty-flow init`) and wiring of the runtime collaborators.
 */

import fs from 'fs-extra';
import path from 'path';
import { CONFIG_FILES, WorkflowConfig } from '../core/config';
import { FileInstructionSource, InstructionCache, InstructionStore } from '../core/instruction-store';
import { WorkflowLogger } from '../core/logger';
import { TransitionSink } from '../core/orchestrator';
import { PromptManager } from '../core/prompt-manager';
import { ReasoningClient } from '../core/reasoning';
import { AnthropicReasoningClient } from './reasoning-client';
import { WorkflowRunner, createRunner } from './runner';

export function getPackageRoot(): string {
    // From src/shell or dist/shell, go up to package root
    return path.resolve(__dirname, '..', '..');
}

/** Shared by every run in this process. */
export const instructionCache = new InstructionCache();

export interface Workflow {
    config: WorkflowConfig;
    instructions: InstructionStore;
    renderer: PromptManager;
    runner: WorkflowRunner;
}

export interface WorkflowOptions {
    logger: WorkflowLogger;
    /** Defaults to the Anthropic client built from `config.llm`. */
    client?: ReasoningClient;
    cache?: InstructionCache;
    sink?: TransitionSink;
}

export function createInstructionStore(
    config: WorkflowConfig,
    logger: WorkflowLogger,
    cache: InstructionCache = instructionCache
): InstructionStore {
    return new InstructionStore(new FileInstructionSource(config.instructions.dir), cache, logger);
}

export function createWorkflow(config: WorkflowConfig, options: WorkflowOptions): Workflow {
    const instructions = createInstructionStore(config, options.logger, options.cache);
    const renderer = new PromptManager(config.prompts.dir);
    const client = options.client ?? new AnthropicReasoningClient(config.llm);

    return {
        config,
        instructions,
        renderer,
        runner: createRunner(config, {
            instructions,
            client,
            renderer,
            logger: options.logger,
            sink: options.sink,
        }),
    };
}

/**
 * Writes a default config and copies the bundled step instructions.
 * Never overwrites existing files.
 */
export async function bootstrap(rootDir: string, logger: WorkflowLogger): Promise<void> {
    const packageRoot = getPackageRoot();

    // 1. Instructions
    const instructionsSrc = path.join(packageRoot, 'instructions', 'steps');
    const instructionsDest = path.join(rootDir, 'instructions', 'steps');
    if (await fs.pathExists(instructionsSrc)) {
        await fs.ensureDir(instructionsDest);
        await fs.copy(instructionsSrc, instructionsDest, { overwrite: false });
        logger.success(`✅ Copied step instructions to ${instructionsDest}`);
    } else {
        logger.warn(`⚠️ Could not find bundled instructions at: ${instructionsSrc}`);
    }

    // 2. Config
    const configPath = path.join(rootDir, CONFIG_FILES[1]);
    if (!(await fs.pathExists(configPath))) {
        await fs.writeJson(configPath, {
            mode: 'state-machine',
            entryStep: '01-extract-serial',
            instructions: { dir: './instructions/steps' },
            orchestrator: { maxSteps: 10, parseFailurePolicy: 'fail' },
            llm: { model: 'claude-sonnet-4-5' },
        }, { spaces: 2 });
        logger.success(`✅ Created ${CONFIG_FILES[1]}`);
    }
}
