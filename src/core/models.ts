/**
 * CORE: Result Models
 * Value objects produced by the executor and the orchestrator.
 */

import type { StepContext, StepFields } from './context';
import type { ParseFailureError, WorkflowError } from './errors';

/** Reserved next-step value meaning "no further step". */
export const TERMINAL_STEP = 'DONE';

export type StepId = string;

export interface StepExecutionResult {
    readonly stepId: StepId;
    readonly responseText: string;
    /** Parsed next step, TERMINAL_STEP, or null when the reply carried no routing. */
    readonly nextStep: StepId | null;
    readonly fields: Readonly<StepFields>;
    readonly ok: boolean;
    readonly error?: ParseFailureError;
    readonly elapsedMs: number;
}

export type RunStatus = 'completed' | 'circuit-broken' | 'failed';

export interface OrchestrationResult {
    readonly runId: string;
    readonly trace: readonly StepExecutionResult[];
    readonly context: StepContext;
    readonly status: RunStatus;
    /** Step the run stopped at: the last executed step, the failing one, or the one the breaker refused. */
    readonly terminalStep: StepId;
    readonly stepCount: number;
    readonly elapsedMs: number;
    readonly error?: WorkflowError;
}

export function createStepResult(result: StepExecutionResult): StepExecutionResult {
    return Object.freeze({ ...result, fields: Object.freeze({ ...result.fields }) });
}

export function createOrchestrationResult(result: OrchestrationResult): OrchestrationResult {
    return Object.freeze({ ...result, trace: Object.freeze([...result.trace]) });
}

export function isTerminalStep(stepId: StepId | null): boolean {
    return stepId === TERMINAL_STEP;
}

/** Ordered step ids of a run, as compared by step-sequence validation. */
export function traceStepIds(result: Pick<OrchestrationResult, 'trace'>): StepId[] {
    return result.trace.map(entry => entry.stepId);
}
