/**
 * CORE: Instruction Store
 * Read-through cache of step instruction documents.
 */

import fs from 'fs-extra';
import path from 'path';
import { InstructionNotFoundError, WorkflowError, describeError } from './errors';
import { WorkflowLogger, SilentLogger } from './logger';
import { StepId } from './models';

const MAX_INSTRUCTION_BYTES = 50 * 1024; // 50KB
const STEP_ID_REGEX = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

/**
 * Step ids double as file names. Whitelist keeps them inside the instruction directory.
 */
export function isValidStepId(stepId: string): boolean {
    return STEP_ID_REGEX.test(stepId);
}

export interface InstructionSource {
    /** Document text, or null when no document exists for the id. */
    read(stepId: StepId): Promise<string | null>;
    list(): Promise<StepId[]>;
}

/**
 * Process-lifetime cache. Holds the in-flight promise per key so that
 * concurrent lookups share one read; a rejected read is evicted.
 */
export class InstructionCache {
    private entries = new Map<StepId, Promise<string>>();

    getOrLoad(stepId: StepId, load: () => Promise<string>): Promise<string> {
        const cached = this.entries.get(stepId);
        if (cached) return cached;

        const pending = load();
        this.entries.set(stepId, pending);
        pending.catch(() => {
            if (this.entries.get(stepId) === pending) {
                this.entries.delete(stepId);
            }
        });
        return pending;
    }

    has(stepId: StepId): boolean {
        return this.entries.has(stepId);
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}

/**
 * Audit: path.relative avoids the prefix trap of startsWith on real paths.
 */
function isPathInsideRoot(realPath: string, realRootDir: string): boolean {
    const relative = path.relative(realRootDir, realPath);
    return !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Reads `<dir>/<stepId>.md`.
 */
export class FileInstructionSource implements InstructionSource {
    constructor(private dir: string) { }

    async read(stepId: StepId): Promise<string | null> {
        const filePath = path.join(this.dir, `${stepId}.md`);
        if (!await fs.pathExists(filePath)) {
            return null;
        }

        // SECURITY: Block symlinks pointing outside the instruction directory
        const realRootDir = await fs.realpath(this.dir);
        const realPath = await fs.realpath(filePath);
        if (!isPathInsideRoot(realPath, realRootDir)) {
            throw new InstructionNotFoundError(stepId, `document resolves outside ${this.dir}`);
        }

        const stats = await fs.stat(realPath);
        if (stats.size > MAX_INSTRUCTION_BYTES) {
            throw new WorkflowError(
                `Instruction for step '${stepId}' is ${stats.size} bytes (limit ${MAX_INSTRUCTION_BYTES})`,
                'instruction_too_large',
                'Split the instruction or move reference material out of it.'
            );
        }

        return fs.readFile(realPath, 'utf-8');
    }

    async list(): Promise<StepId[]> {
        if (!await fs.pathExists(this.dir)) {
            return [];
        }
        const files = await fs.readdir(this.dir);
        return files
            .filter(f => f.endsWith('.md'))
            .map(f => f.slice(0, -'.md'.length))
            .filter(isValidStepId)
            .sort();
    }
}

/**
 * In-memory documents, for tests and embedding.
 */
export class MemoryInstructionSource implements InstructionSource {
    reads = 0;
    private documents: Map<StepId, string>;

    constructor(documents: Record<StepId, string>) {
        this.documents = new Map(Object.entries(documents));
    }

    async read(stepId: StepId): Promise<string | null> {
        this.reads++;
        return this.documents.get(stepId) ?? null;
    }

    async list(): Promise<StepId[]> {
        return [...this.documents.keys()].sort();
    }
}

export class InstructionStore {
    constructor(
        private source: InstructionSource,
        private cache: InstructionCache = new InstructionCache(),
        private logger: WorkflowLogger = new SilentLogger()
    ) { }

    load(stepId: StepId): Promise<string> {
        if (!isValidStepId(stepId)) {
            return Promise.reject(new InstructionNotFoundError(stepId, 'invalid step id'));
        }

        return this.cache.getOrLoad(stepId, async () => {
            let text: string | null;
            try {
                text = await this.source.read(stepId);
            } catch (error) {
                if (error instanceof WorkflowError) throw error;
                throw new InstructionNotFoundError(stepId, describeError(error), { cause: error });
            }

            if (text === null || text.trim() === '') {
                throw new InstructionNotFoundError(stepId);
            }

            this.logger.debug(`[instructions] cached ${stepId}`, { stepId, size: text.length });
            return text.trim();
        });
    }

    list(): Promise<StepId[]> {
        return this.source.list();
    }
}
