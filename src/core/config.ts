import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { DEFAULT_MAX_STEPS } from './orchestrator';

export const DEFAULT_FINAL_STEPS = [
    '05-send-confirmation',
    '04-out-of-scope',
    '03d-request-serial',
    'DONE',
];

export const ConfigSchema = z.object({
    mode: z.enum(['state-machine', 'legacy']).default('state-machine'),
    entryStep: z.string().min(1).default('01-extract-serial'),
    instructions: z.object({
        dir: z.string().min(1).default('./instructions/steps'),
    }).default({}),
    prompts: z.object({
        dir: z.string().min(1).optional(),
    }).default({}),
    orchestrator: z.object({
        maxSteps: z.number().int().min(1).max(100).default(DEFAULT_MAX_STEPS),
        parseFailurePolicy: z.enum(['fail', 'retry-once']).default('fail'),
        timeoutMs: z.number().int().positive().optional(),
    }).default({}),
    llm: z.object({
        model: z.string().min(1).default('claude-sonnet-4-5'),
        maxTokens: z.number().int().positive().default(1024),
        temperature: z.number().min(0).max(1).default(0),
        timeoutMs: z.number().int().positive().default(30_000),
    }).default({}),
    legacy: z.object({
        instruction: z.string().min(1).default('main'),
    }).default({}),
    eval: z.object({
        casesDir: z.string().min(1).default('./evals'),
        passThreshold: z.number().min(0).max(100).default(99),
        finalSteps: z.array(z.string().min(1)).default(DEFAULT_FINAL_STEPS),
    }).default({}),
    logging: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    }).default({}),
});

export type WorkflowConfig = z.infer<typeof ConfigSchema>;
export type DispatchMode = WorkflowConfig['mode'];

export const CONFIG_FILES = ['warranty.config.jsonc', 'warranty.config.json'];

export class ConfigLoader {
    private configPath: string;
    private workDir: string;

    constructor(workDir: string) {
        this.workDir = workDir;
        const jsoncPath = path.join(workDir, CONFIG_FILES[0]);
        const jsonPath = path.join(workDir, CONFIG_FILES[1]);

        if (fs.existsSync(jsoncPath)) {
            this.configPath = jsoncPath;
        } else {
            this.configPath = jsonPath;
        }
    }

    get path(): string {
        return this.configPath;
    }

    async load(): Promise<WorkflowConfig> {
        if (!await fs.pathExists(this.configPath)) {
            throw new ConfigError(
                `Config file not found: ${this.configPath}`,
                'config_file_not_found',
                `Create warranty.config.json with at least:\n{\n  "instructions": { "dir": "./instructions/steps" }\n}`
            );
        }

        // Strip comments for jsonc
        let content = await fs.readFile(this.configPath, 'utf-8');
        content = this.stripJsonComments(content);

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            throw new ConfigError(`Invalid config JSON: ${describeError(e)}`, 'config_invalid_json', undefined, { cause: e });
        }

        return this.resolvePaths(parseConfig(raw));
    }

    /**
     * Relative paths in the file are relative to the file, not to the cwd.
     */
    private resolvePaths(config: WorkflowConfig): WorkflowConfig {
        return {
            ...config,
            instructions: { dir: path.resolve(this.workDir, config.instructions.dir) },
            prompts: { dir: config.prompts.dir ? path.resolve(this.workDir, config.prompts.dir) : undefined },
            eval: { ...config.eval, casesDir: path.resolve(this.workDir, config.eval.casesDir) },
        };
    }

    private stripJsonComments(content: string): string {
        return content.replace(/^\s*\/\/.*$/gm, '');
    }
}

/**
 * Validates a raw config object and fills in defaults.
 */
export function parseConfig(raw: unknown): WorkflowConfig {
    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(
            `Invalid config: ${issues}`,
            'config_invalid_field',
            undefined,
            { details: { issues: parsed.error.issues.map(issue => issue.path.join('.')) } }
        );
    }
    return parsed.data;
}
