/**
 * SHELL: Reasoning Client Tests
 * The Anthropic adapter runs against an in-process fake of the messages resource.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { WorkflowError } from '../core/errors';
import { AbortError } from '../core/reasoning';
import { AnthropicReasoningClient, MessagesApi, ScriptedReasoningClient } from './reasoning-client';

type CreateBody = Parameters<MessagesApi['create']>[0];
type CreateOptions = Parameters<MessagesApi['create']>[1];

class FakeMessages implements MessagesApi {
    calls: Array<{ body: CreateBody; options: CreateOptions }> = [];

    constructor(private content: Array<{ type: string; text?: string }>) { }

    async create(body: CreateBody, options?: CreateOptions) {
        this.calls.push({ body, options });
        return { content: this.content };
    }
}

const settings = { model: 'test-model', maxTokens: 256, temperature: 0, timeoutMs: 1000 };

describe('AnthropicReasoningClient', () => {
    it('sends the prompt as one user message and joins text blocks', async () => {
        const messages = new FakeMessages([
            { type: 'text', text: 'Serial found.\n' },
            { type: 'tool_use' },
            { type: 'text', text: 'NEXT_STEP: DONE\n' },
        ]);
        const client = new AnthropicReasoningClient({ ...settings, messages });
        const controller = new AbortController();

        const reply = await client.respond('the prompt', { signal: controller.signal });

        assert.strictEqual(reply, 'Serial found.\nNEXT_STEP: DONE');
        assert.deepStrictEqual(messages.calls[0].body, {
            model: 'test-model',
            max_tokens: 256,
            temperature: 0,
            messages: [{ role: 'user', content: 'the prompt' }],
        });
        assert.strictEqual(messages.calls[0].options?.signal, controller.signal);
        assert.strictEqual(messages.calls[0].options?.timeout, 1000);
    });

    it('rejects an empty reply', async () => {
        const client = new AnthropicReasoningClient({ ...settings, messages: new FakeMessages([{ type: 'text', text: '  ' }]) });
        await assert.rejects(
            client.respond('p'),
            (error: unknown) => error instanceof WorkflowError && error.code === 'llm_empty_response'
        );
    });

    it('requires an API key when no messages resource is injected', () => {
        const saved = process.env.ANTHROPIC_API_KEY;
        delete process.env.ANTHROPIC_API_KEY;
        try {
            assert.throws(
                () => new AnthropicReasoningClient(settings),
                (error: unknown) => error instanceof WorkflowError && error.code === 'llm_missing_api_key'
            );
        } finally {
            if (saved !== undefined) process.env.ANTHROPIC_API_KEY = saved;
        }
    });

    it('builds the SDK client from an explicit key', () => {
        assert.doesNotThrow(() => new AnthropicReasoningClient({ ...settings, apiKey: 'test-secret' }));
    });
});

describe('ScriptedReasoningClient', () => {
    it('replays replies in order and records prompts', async () => {
        const client = new ScriptedReasoningClient(['one', 'two']);
        assert.strictEqual(await client.respond('p1'), 'one');
        assert.strictEqual(await client.respond('p2'), 'two');
        assert.deepStrictEqual(client.prompts, ['p1', 'p2']);
        assert.strictEqual(client.calls, 2);
    });

    it('throws scripted errors and runs out of replies', async () => {
        const client = new ScriptedReasoningClient([new Error('overloaded')]);
        await assert.rejects(client.respond('p1'), { message: 'overloaded' });
        await assert.rejects(client.respond('p2'), { message: 'Scripted client has no reply for call 2' });
    });

    it('refuses to answer once the signal has aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const client = new ScriptedReasoningClient(['one']);
        await assert.rejects(client.respond('p', { signal: controller.signal }), AbortError);
        assert.strictEqual(client.calls, 0);
    });
});
