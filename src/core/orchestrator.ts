/**
 * CORE: Step Orchestrator
 * Drives a run: executes steps until DONE, the step ceiling, or an unrecoverable failure.
 * All routing decisions go through the reducer in ./machine.
 */

import { randomUUID } from 'crypto';
import { StepContext, applyStepFields } from './context';
import {
    CircuitBrokenError,
    ExecutionFailureError,
    ParseFailureError,
    WorkflowError,
    describeError,
} from './errors';
import { ExecuteOptions } from './executor';
import { WorkflowLogger, SilentLogger } from './logger';
import {
    ParseFailurePolicy,
    RunAction,
    RunPhase,
    RunState,
    initialRunState,
    isTerminalPhase,
    reducer,
} from './machine';
import {
    OrchestrationResult,
    RunStatus,
    StepExecutionResult,
    StepId,
    createOrchestrationResult,
} from './models';
import { linkSignal } from './reasoning';
import { validateMaxSteps } from './rules';

export const DEFAULT_MAX_STEPS = 10;

/** Anything that can execute one step; StepExecutor in production. */
export interface StepRunner {
    execute(stepId: StepId, context: StepContext, options?: ExecuteOptions): Promise<StepExecutionResult>;
}

export interface TransitionEntry {
    runId: string;
    stepId: StepId;
    stepNumber: number;
    from: RunPhase;
    to: RunPhase;
    nextStep?: StepId | null;
    elapsedMs: number;
}

export type TransitionSink = (entry: TransitionEntry) => void;

export interface OrchestratorOptions {
    maxSteps?: number;
    parseFailurePolicy?: ParseFailurePolicy;
    logger?: WorkflowLogger;
    /** Receives one entry per state transition. Defaults to the logger. */
    sink?: TransitionSink;
}

export interface RunOptions {
    /** Overrides the orchestrator's ceiling for this run. */
    maxSteps?: number;
    signal?: AbortSignal;
    timeoutMs?: number;
    runId?: string;
}

const STATUS_BY_PHASE: Record<Exclude<RunPhase, 'running'>, RunStatus> = {
    done: 'completed',
    circuit_broken: 'circuit-broken',
    failed: 'failed',
};

export class StepOrchestrator {
    private maxSteps: number;
    private parseFailurePolicy: ParseFailurePolicy;
    private logger: WorkflowLogger;
    private sink: TransitionSink;

    constructor(private executor: StepRunner, options: OrchestratorOptions = {}) {
        this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
        validateMaxSteps(this.maxSteps);
        this.parseFailurePolicy = options.parseFailurePolicy ?? 'fail';
        this.logger = options.logger ?? new SilentLogger();
        this.sink = options.sink ?? logTransition(this.logger);
    }

    async run(entryStep: StepId, initialContext: StepContext, options: RunOptions = {}): Promise<OrchestrationResult> {
        const runId = options.runId ?? randomUUID();
        const maxSteps = options.maxSteps ?? this.maxSteps;
        validateMaxSteps(maxSteps);
        const startedAt = Date.now();
        const linked = linkSignal(options.signal, options.timeoutMs);

        const trace: StepExecutionResult[] = [];
        let context = initialContext;
        let state = initialRunState(entryStep, maxSteps);
        let error: WorkflowError | undefined;

        this.logger.info(`[run] ${runId} starting at ${entryStep} (max ${maxSteps} steps)`, {
            runId,
            emailId: initialContext.emailId,
            entryStep,
        });

        try {
            while (!isTerminalPhase(state.phase)) {
                const stepId = state.currentStep;
                const stepStartedAt = Date.now();

                if (linked.signal.aborted) {
                    error = new ExecutionFailureError(
                        `Run cancelled before step '${stepId}': ${describeError(linked.signal.reason)}`,
                        'execution_cancelled',
                        stepId,
                        { cause: linked.signal.reason, cancelled: true }
                    );
                    state = this.transition(runId, state, { type: 'EXECUTION_FAILED', stepId }, stepStartedAt);
                    break;
                }

                state = this.transition(runId, state, { type: 'STEP_STARTED', stepId }, stepStartedAt);
                if (state.phase === 'circuit_broken') {
                    error = new CircuitBrokenError(maxSteps, stepId);
                    this.logger.warn(`[run] ${runId}: ${error.message}`);
                    break;
                }

                let result: StepExecutionResult;
                try {
                    result = await this.executor.execute(stepId, context, { signal: linked.signal });
                } catch (caught) {
                    error = caught instanceof ExecutionFailureError
                        ? caught
                        : new ExecutionFailureError(
                            `Step '${stepId}' failed: ${describeError(caught)}`,
                            'execution_unexpected_error',
                            stepId,
                            { cause: caught }
                        );
                    this.logger.error(`[run] ${runId}: ${error.message}`);
                    state = this.transition(runId, state, { type: 'EXECUTION_FAILED', stepId }, stepStartedAt);
                    break;
                }

                trace.push(result);

                if (!result.ok || result.nextStep === null) {
                    state = this.transition(
                        runId,
                        state,
                        { type: 'STEP_PARSE_FAILED', stepId, policy: this.parseFailurePolicy },
                        stepStartedAt,
                        null
                    );
                    if (state.phase === 'failed') {
                        error = result.error ?? new ParseFailureError(stepId, 'reply has no NEXT_STEP line');
                    } else {
                        this.logger.warn(`[run] ${runId}: retrying ${stepId} after unparseable reply`);
                    }
                    continue;
                }

                context = applyStepFields(context, result.fields);
                state = this.transition(
                    runId,
                    state,
                    { type: 'STEP_SUCCEEDED', stepId, nextStep: result.nextStep },
                    stepStartedAt,
                    result.nextStep
                );
            }
        } catch (caught) {
            // e.g. a TransitionError; the run still ends with its partial trace
            error = caught instanceof WorkflowError
                ? caught
                : new ExecutionFailureError(
                    `Run failed at step '${state.currentStep}': ${describeError(caught)}`,
                    'execution_unexpected_error',
                    state.currentStep,
                    { cause: caught }
                );
            this.logger.error(`[run] ${runId}: ${error.message}`);
            state = { ...state, phase: 'failed', inFlight: false };
        } finally {
            linked.dispose();
        }

        return this.finish(runId, state, trace, context, startedAt, error);
    }

    /**
     * Applies one action and reports it to the sink. Starting a step is not reported on its own;
     * its outcome is.
     */
    private transition(
        runId: string,
        state: RunState,
        action: RunAction,
        stepStartedAt: number,
        nextStep?: StepId | null
    ): RunState {
        const next = reducer(state, action);
        if (action.type === 'STEP_STARTED' && next.phase === 'running') return next;

        emitTransition(this.sink, this.logger, {
            runId,
            stepId: action.stepId,
            stepNumber: next.stepCount,
            from: state.phase,
            to: next.phase,
            nextStep,
            elapsedMs: Date.now() - stepStartedAt,
        });
        return next;
    }

    private finish(
        runId: string,
        state: RunState,
        trace: StepExecutionResult[],
        context: StepContext,
        startedAt: number,
        error?: WorkflowError
    ): OrchestrationResult {
        const status = state.phase === 'running' ? 'failed' : STATUS_BY_PHASE[state.phase];
        const elapsedMs = Date.now() - startedAt;
        const stepIds = trace.map(entry => entry.stepId);
        const terminalStep = state.phase === 'done' ? (stepIds[stepIds.length - 1] ?? state.currentStep) : state.currentStep;

        if (status === 'completed') {
            this.logger.success(`[run] ${runId} completed in ${trace.length} steps`, { runId, steps: stepIds, elapsedMs });
        } else {
            this.logger.warn(`[run] ${runId} ended ${status} at ${terminalStep}`, { runId, steps: stepIds, elapsedMs, code: error?.code });
        }

        return createOrchestrationResult({
            runId,
            trace,
            // Never hand back the object a step runner was given
            context: applyStepFields(context, {}),
            status,
            terminalStep,
            stepCount: trace.length,
            elapsedMs,
            error,
        });
    }
}

/** Default sink: one log line per transition. */
export function logTransition(logger: WorkflowLogger): TransitionSink {
    return entry => logger.info(
        `[transition] ${entry.stepId} (${entry.stepNumber}): ${entry.from} -> ${entry.to}`,
        entry
    );
}

/** Sends an entry to the sink. A throwing sink is logged and otherwise ignored. */
export function emitTransition(sink: TransitionSink, logger: WorkflowLogger, entry: TransitionEntry): void {
    try {
        sink(entry);
    } catch (error) {
        logger.warn(`[transition] sink failed on ${entry.stepId}: ${describeError(error)}`, { runId: entry.runId });
    }
}
