import { WorkflowLogger } from './logger';

export interface WorkflowErrorOptions {
    cause?: unknown;
    details?: Record<string, unknown>;
}

/**
 * Base error for the workflow engine.
 * Codes follow `{component}_{error_type}`, e.g. `instruction_not_found`.
 */
export class WorkflowError extends Error {
    readonly details: Record<string, unknown>;

    constructor(
        message: string,
        public readonly code: string,
        public readonly recoveryHint?: string,
        options: WorkflowErrorOptions = {}
    ) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'WorkflowError';
        this.details = options.details ?? {};
    }

    toString(): string {
        if (this.recoveryHint) {
            return `${this.message}\n💡 Hint: ${this.recoveryHint}`;
        }
        return this.message;
    }
}

/**
 * No instruction document exists for a step id.
 */
export class InstructionNotFoundError extends WorkflowError {
    constructor(public readonly stepId: string, reason?: string, options: WorkflowErrorOptions = {}) {
        super(
            `Instruction not found for step '${stepId}'${reason ? `: ${reason}` : ''}`,
            'instruction_not_found',
            `Add ${stepId}.md to the instructions directory or fix the routing that led here.`,
            { ...options, details: { stepId, ...options.details } }
        );
        this.name = 'InstructionNotFoundError';
    }
}

/**
 * A step could not obtain a reply: missing instruction, broken template,
 * reasoning service error or cancellation. Fatal to the run.
 */
export class ExecutionFailureError extends WorkflowError {
    readonly cancelled: boolean;

    constructor(
        message: string,
        code: string,
        public readonly stepId: string,
        options: WorkflowErrorOptions & { cancelled?: boolean } = {}
    ) {
        super(
            message,
            code,
            options.cancelled
                ? 'The run was cancelled or timed out. Re-run the whole email when ready.'
                : 'Check the reasoning service and instruction documents, then retry the run.',
            { cause: options.cause, details: { stepId, ...options.details } }
        );
        this.name = 'ExecutionFailureError';
        this.cancelled = options.cancelled ?? false;
    }
}

/**
 * The reply carried no usable NEXT_STEP marker.
 */
export class ParseFailureError extends WorkflowError {
    constructor(public readonly stepId: string, reason: string) {
        super(
            `Could not parse routing decision of step '${stepId}': ${reason}`,
            'parse_missing_next_step',
            'The step instruction must ask for a "NEXT_STEP: <step>" line.',
            { details: { stepId } }
        );
        this.name = 'ParseFailureError';
    }
}

/**
 * The step ceiling was hit. A designed stop, usually pointing at a routing loop.
 */
export class CircuitBrokenError extends WorkflowError {
    constructor(public readonly maxSteps: number, public readonly pendingStep: string) {
        super(
            `Circuit breaker triggered: exceeded max steps (${maxSteps}) before running '${pendingStep}'`,
            'orchestrator_max_steps_exceeded',
            'Look for steps that route back to each other, or raise orchestrator.maxSteps.',
            { details: { maxSteps, pendingStep } }
        );
        this.name = 'CircuitBrokenError';
    }
}

export class ConfigError extends WorkflowError {
    constructor(message: string, code: string, recoveryHint?: string, options: WorkflowErrorOptions = {}) {
        super(message, code, recoveryHint ?? 'Fix warranty.config.json and run again.', options);
        this.name = 'ConfigError';
    }
}

/**
 * An action was applied to a run state that does not accept it.
 */
export class TransitionError extends WorkflowError {
    constructor(message: string) {
        super(message, 'orchestrator_invalid_transition');
        this.name = 'TransitionError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Log error with recovery hint
 */
export function logError(logger: WorkflowLogger, error: Error): void {
    if (error instanceof WorkflowError) {
        logger.error(`[ERROR] ${error.message} (code: ${error.code})`);
        if (error.recoveryHint) {
            logger.info(`💡 Hint: ${error.recoveryHint}`);
        }
    } else {
        logger.error(`[ERROR] ${error.message}`);
    }
}
