/**
 * SHELL: Dispatch Strategies
 * Two independent ways to process one email behind a single run interface.
 * The strategy is picked once per run from `config.mode`.
 */

import { randomUUID } from 'crypto';
import { StepContext, applyStepFields } from '../core/context';
import { DispatchMode, WorkflowConfig } from '../core/config';
import { ExecutionFailureError, WorkflowError, describeError } from '../core/errors';
import { StepExecutor } from '../core/executor';
import { InstructionStore } from '../core/instruction-store';
import { WorkflowLogger, SilentLogger } from '../core/logger';
import { OrchestrationResult, StepId, createOrchestrationResult } from '../core/models';
import { StepOrchestrator, TransitionSink, emitTransition, logTransition } from '../core/orchestrator';
import { PromptRenderer } from '../core/prompt-manager';
import { ReasoningClient, linkSignal } from '../core/reasoning';

export interface RunRequest {
    context: StepContext;
    entryStep?: StepId;
    /** Step ceiling for this run. The legacy runner always makes exactly one call and ignores it. */
    maxSteps?: number;
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface WorkflowRunner {
    readonly mode: DispatchMode;
    run(request: RunRequest): Promise<OrchestrationResult>;
}

export interface RunnerDeps {
    instructions: InstructionStore;
    client: ReasoningClient;
    renderer: PromptRenderer;
    logger?: WorkflowLogger;
    sink?: TransitionSink;
}

export class StateMachineRunner implements WorkflowRunner {
    readonly mode = 'state-machine' as const;
    private orchestrator: StepOrchestrator;

    constructor(private config: WorkflowConfig, deps: RunnerDeps) {
        const executor = new StepExecutor({
            instructions: deps.instructions,
            client: deps.client,
            renderer: deps.renderer,
            logger: deps.logger,
        });
        this.orchestrator = new StepOrchestrator(executor, {
            maxSteps: config.orchestrator.maxSteps,
            parseFailurePolicy: config.orchestrator.parseFailurePolicy,
            logger: deps.logger,
            sink: deps.sink,
        });
    }

    run(request: RunRequest): Promise<OrchestrationResult> {
        return this.orchestrator.run(request.entryStep ?? this.config.entryStep, request.context, {
            maxSteps: request.maxSteps,
            signal: request.signal,
            timeoutMs: request.timeoutMs ?? this.config.orchestrator.timeoutMs,
        });
    }
}

/**
 * Single-pass processing: one reasoning call with the main instruction,
 * no step routing. The trace holds exactly one entry.
 */
export class LegacyRunner implements WorkflowRunner {
    readonly mode = 'legacy' as const;
    private executor: StepExecutor;
    private logger: WorkflowLogger;
    private sink: TransitionSink;

    constructor(private config: WorkflowConfig, deps: RunnerDeps) {
        this.logger = deps.logger ?? new SilentLogger();
        this.sink = deps.sink ?? logTransition(this.logger);
        this.executor = new StepExecutor({
            instructions: deps.instructions,
            client: deps.client,
            renderer: deps.renderer,
            logger: deps.logger,
        });
    }

    async run(request: RunRequest): Promise<OrchestrationResult> {
        const runId = randomUUID();
        const stepId = this.config.legacy.instruction;
        const startedAt = Date.now();
        const linked = linkSignal(request.signal, request.timeoutMs ?? this.config.orchestrator.timeoutMs);

        this.logger.info(`[run] ${runId} legacy pass with ${stepId}`, { runId, emailId: request.context.emailId });

        try {
            const result = await this.executor.execute(stepId, request.context, { signal: linked.signal });
            const ok = result.ok;
            emitTransition(this.sink, this.logger, {
                runId,
                stepId,
                stepNumber: 1,
                from: 'running',
                to: ok ? 'done' : 'failed',
                nextStep: result.nextStep,
                elapsedMs: Date.now() - startedAt,
            });
            return createOrchestrationResult({
                runId,
                trace: [result],
                context: applyStepFields(request.context, ok ? result.fields : {}),
                status: ok ? 'completed' : 'failed',
                terminalStep: stepId,
                stepCount: 1,
                elapsedMs: Date.now() - startedAt,
                error: result.error,
            });
        } catch (caught) {
            const error: WorkflowError = caught instanceof ExecutionFailureError
                ? caught
                : new ExecutionFailureError(
                    `Legacy pass failed: ${describeError(caught)}`,
                    'execution_unexpected_error',
                    stepId,
                    { cause: caught }
                );
            this.logger.error(`[run] ${runId}: ${error.message}`);
            emitTransition(this.sink, this.logger, {
                runId,
                stepId,
                stepNumber: 1,
                from: 'running',
                to: 'failed',
                elapsedMs: Date.now() - startedAt,
            });
            return createOrchestrationResult({
                runId,
                trace: [],
                context: applyStepFields(request.context, {}),
                status: 'failed',
                terminalStep: stepId,
                stepCount: 0,
                elapsedMs: Date.now() - startedAt,
                error,
            });
        } finally {
            linked.dispose();
        }
    }
}

export function createRunner(config: WorkflowConfig, deps: RunnerDeps): WorkflowRunner {
    switch (config.mode) {
        case 'legacy':
            return new LegacyRunner(config, deps);
        case 'state-machine':
            return new StateMachineRunner(config, deps);
    }
}
