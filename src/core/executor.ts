/**
 * CORE: Step Executor
 * instruction -> prompt -> reasoning service -> routing decision.
 */

import { StepContext } from './context';
import {
    ExecutionFailureError,
    ParseFailureError,
    WorkflowError,
    describeError,
} from './errors';
import { InstructionStore } from './instruction-store';
import { WorkflowLogger, SilentLogger } from './logger';
import { StepExecutionResult, StepId, createStepResult } from './models';
import { MarkerRoutingParser, RoutingParser } from './parser';
import { PromptRenderer, buildPromptContext } from './prompt-manager';
import { AbortError, ReasoningClient, raceAbort } from './reasoning';

export interface StepExecutorDeps {
    instructions: InstructionStore;
    client: ReasoningClient;
    renderer: PromptRenderer;
    parser?: RoutingParser;
    logger?: WorkflowLogger;
    /** Template used to render every step. */
    template?: string;
}

export interface ExecuteOptions {
    signal?: AbortSignal;
}

export class StepExecutor {
    private parser: RoutingParser;
    private logger: WorkflowLogger;
    private template: string;

    constructor(private deps: StepExecutorDeps) {
        this.parser = deps.parser ?? new MarkerRoutingParser();
        this.logger = deps.logger ?? new SilentLogger();
        this.template = deps.template ?? 'step';
    }

    /**
     * Throws ExecutionFailureError when no reply could be obtained.
     * A reply without routing is returned with `ok: false`, never thrown.
     */
    async execute(stepId: StepId, context: StepContext, options: ExecuteOptions = {}): Promise<StepExecutionResult> {
        const startedAt = Date.now();
        const { signal } = options;

        this.throwIfCancelled(stepId, signal);

        let instruction: string;
        try {
            instruction = await raceAbort(this.deps.instructions.load(stepId), signal);
        } catch (error) {
            this.throwIfCancelled(stepId, signal, error);
            throw new ExecutionFailureError(
                `Step '${stepId}' has no usable instruction: ${describeError(error)}`,
                'execution_instruction_missing',
                stepId,
                { cause: error, details: { causeCode: errorCode(error) } }
            );
        }

        let prompt: string;
        try {
            prompt = this.deps.renderer.render(this.template, buildPromptContext(stepId, instruction, context));
        } catch (error) {
            throw new ExecutionFailureError(
                `Could not render prompt for step '${stepId}': ${describeError(error)}`,
                'execution_render_failed',
                stepId,
                { cause: error }
            );
        }

        let responseText: string;
        try {
            responseText = await raceAbort(this.deps.client.respond(prompt, { signal }), signal);
        } catch (error) {
            this.throwIfCancelled(stepId, signal, error);
            throw new ExecutionFailureError(
                `Reasoning service failed on step '${stepId}': ${describeError(error)}`,
                'execution_service_failed',
                stepId,
                { cause: error }
            );
        }

        const decision = this.parser.parse(responseText);
        const elapsedMs = Date.now() - startedAt;

        const nextStep = decision.nextStep?.trim() ?? '';

        if (!nextStep) {
            const error = new ParseFailureError(stepId, 'reply has no NEXT_STEP line');
            this.logger.warn(`[step] ${stepId}: ${error.message}`, { stepId, elapsedMs });
            return createStepResult({
                stepId,
                responseText,
                nextStep: null,
                fields: decision.fields,
                ok: false,
                error,
                elapsedMs,
            });
        }

        this.logger.debug(`[step] ${stepId} -> ${nextStep}`, { stepId, fields: decision.fields, elapsedMs });
        return createStepResult({
            stepId,
            responseText,
            nextStep,
            fields: decision.fields,
            ok: true,
            elapsedMs,
        });
    }

    private throwIfCancelled(stepId: StepId, signal?: AbortSignal, cause?: unknown): void {
        if (!signal?.aborted && !(cause instanceof AbortError)) return;
        const reason = signal?.reason ?? cause;
        throw new ExecutionFailureError(
            `Step '${stepId}' was cancelled: ${describeError(reason)}`,
            'execution_cancelled',
            stepId,
            { cause: reason, cancelled: true }
        );
    }
}

function errorCode(error: unknown): string | undefined {
    return error instanceof WorkflowError ? error.code : undefined;
}
