/**
 * CORE: Step Executor Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createStepContext } from './context';
import { ExecutionFailureError, ParseFailureError } from './errors';
import { StepExecutor } from './executor';
import { InstructionStore, MemoryInstructionSource } from './instruction-store';
import { PromptRenderer } from './prompt-manager';
import { ReasoningClient } from './reasoning';
import { PromptContext } from './types/context';
import { ScriptedReasoningClient } from '../shell/reasoning-client';

const renderer: PromptRenderer = {
    render: (_template: string, ctx: PromptContext) => `${ctx.step.id}|${ctx.step.instruction}|${ctx.facts.serialNumber ?? '-'}`,
};

const context = createStepContext({ emailId: 'e1', emailContent: 'Broken. SN-12345' });

function store(): InstructionStore {
    return new InstructionStore(new MemoryInstructionSource({
        '01-extract-serial': 'Find the serial.',
        '02-check-warranty': 'Check the warranty.',
    }));
}

function executorWith(client: ReasoningClient): StepExecutor {
    return new StepExecutor({ instructions: store(), client, renderer });
}

async function executionFailure(work: Promise<unknown>): Promise<ExecutionFailureError> {
    try {
        await work;
    } catch (error) {
        if (error instanceof ExecutionFailureError) return error;
        throw error;
    }
    throw new Error('expected an ExecutionFailureError');
}

describe('StepExecutor', () => {
    it('renders the instruction and parses the reply', async () => {
        const client = new ScriptedReasoningClient(['NEXT_STEP: 02-check-warranty\nSERIAL: SN-12345']);
        const result = await executorWith(client).execute('01-extract-serial', context);

        assert.deepStrictEqual(client.prompts, ['01-extract-serial|Find the serial.|-']);
        assert.strictEqual(result.stepId, '01-extract-serial');
        assert.strictEqual(result.ok, true);
        assert.strictEqual(result.nextStep, '02-check-warranty');
        assert.deepStrictEqual(result.fields, { serial: 'SN-12345' });
        assert.strictEqual(result.responseText, 'NEXT_STEP: 02-check-warranty\nSERIAL: SN-12345');
        assert.strictEqual(result.error, undefined);
        assert.ok(result.elapsedMs >= 0);
        assert.ok(Object.isFrozen(result));
        assert.ok(Object.isFrozen(result.fields));
    });

    it('returns ok=false with a null next step when routing is missing', async () => {
        const client = new ScriptedReasoningClient(['The warranty looks fine.\nREASON: purchased last month']);
        const result = await executorWith(client).execute('02-check-warranty', context);

        assert.strictEqual(result.ok, false);
        assert.strictEqual(result.nextStep, null);
        assert.deepStrictEqual(result.fields, { reason: 'purchased last month' });
        assert.ok(result.error instanceof ParseFailureError);
        assert.strictEqual(result.error.stepId, '02-check-warranty');
    });

    it('treats a blank next step from a custom parser as unparseable', async () => {
        const executor = new StepExecutor({
            instructions: store(),
            client: new ScriptedReasoningClient(['NEXT_STEP:   ']),
            renderer,
            parser: { parse: () => ({ nextStep: '  ', fields: { reason: 'unsure' } }) },
        });
        const result = await executor.execute('01-extract-serial', context);

        assert.strictEqual(result.ok, false);
        assert.strictEqual(result.nextStep, null);
        assert.deepStrictEqual(result.fields, { reason: 'unsure' });
        assert.ok(result.error instanceof ParseFailureError);
    });

    it('trims the next step a custom parser returns', async () => {
        const executor = new StepExecutor({
            instructions: store(),
            client: new ScriptedReasoningClient(['whatever']),
            renderer,
            parser: { parse: () => ({ nextStep: ' 02-check-warranty ', fields: {} }) },
        });
        const result = await executor.execute('01-extract-serial', context);

        assert.strictEqual(result.ok, true);
        assert.strictEqual(result.nextStep, '02-check-warranty');
    });

    it('fails when the instruction is missing', async () => {
        const client = new ScriptedReasoningClient(['NEXT_STEP: DONE']);
        const error = await executionFailure(executorWith(client).execute('99-unknown', context));

        assert.strictEqual(error.code, 'execution_instruction_missing');
        assert.strictEqual(error.stepId, '99-unknown');
        assert.strictEqual(error.details.causeCode, 'instruction_not_found');
        assert.strictEqual(error.cancelled, false);
        assert.strictEqual(client.calls, 0);
    });

    it('fails when the template cannot be rendered', async () => {
        const broken: PromptRenderer = {
            render: () => { throw new Error('template missing'); },
        };
        const executor = new StepExecutor({
            instructions: store(),
            client: new ScriptedReasoningClient([]),
            renderer: broken,
        });

        const error = await executionFailure(executor.execute('01-extract-serial', context));
        assert.strictEqual(error.code, 'execution_render_failed');
        assert.strictEqual(error.message, "Could not render prompt for step '01-extract-serial': template missing");
    });

    it('fails when the reasoning service errors', async () => {
        const client = new ScriptedReasoningClient([new Error('503 overloaded')]);
        const error = await executionFailure(executorWith(client).execute('01-extract-serial', context));

        assert.strictEqual(error.code, 'execution_service_failed');
        assert.strictEqual(error.message, "Reasoning service failed on step '01-extract-serial': 503 overloaded");
        assert.strictEqual(error.cancelled, false);
    });

    it('does not call the service when already cancelled', async () => {
        const controller = new AbortController();
        controller.abort(new Error('shutdown'));
        const client = new ScriptedReasoningClient(['NEXT_STEP: DONE']);

        const error = await executionFailure(
            executorWith(client).execute('01-extract-serial', context, { signal: controller.signal })
        );

        assert.strictEqual(error.code, 'execution_cancelled');
        assert.strictEqual(error.cancelled, true);
        assert.strictEqual(error.message, "Step '01-extract-serial' was cancelled: shutdown");
        assert.strictEqual(client.calls, 0);
    });

    it('stops waiting when cancelled mid-call, even if the client ignores the signal', async () => {
        const controller = new AbortController();
        const hanging: ReasoningClient = {
            respond: () => {
                setImmediate(() => controller.abort(new Error('caller gave up')));
                return new Promise<string>(() => undefined);
            },
        };

        const error = await executionFailure(
            executorWith(hanging).execute('01-extract-serial', context, { signal: controller.signal })
        );

        assert.strictEqual(error.code, 'execution_cancelled');
        assert.strictEqual(error.cancelled, true);
    });
});
