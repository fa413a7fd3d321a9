/**
 * SHELL: Reasoning Service Clients
 * Anthropic Messages API adapter, plus a scripted in-process client for evals and tests.
 */

import Anthropic from '@anthropic-ai/sdk';
import { WorkflowError } from '../core/errors';
import { AbortError, ReasoningClient, RespondOptions } from '../core/reasoning';

/** The slice of the SDK's `messages` resource this client uses. */
export interface MessagesApi {
    create(
        body: {
            model: string;
            max_tokens: number;
            temperature?: number;
            messages: Array<{ role: 'user'; content: string }>;
        },
        options?: { signal?: AbortSignal; timeout?: number }
    ): PromiseLike<{ content: Array<{ type: string; text?: string }> }>;
}

export interface AnthropicClientOptions {
    model: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
    apiKey?: string;
    /** Injected for tests; built from the SDK otherwise. */
    messages?: MessagesApi;
}

export class AnthropicReasoningClient implements ReasoningClient {
    private messages: MessagesApi;

    constructor(private options: AnthropicClientOptions) {
        if (options.messages) {
            this.messages = options.messages;
        } else {
            const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
            if (!apiKey) {
                throw new WorkflowError(
                    'ANTHROPIC_API_KEY is not set',
                    'llm_missing_api_key',
                    'Export ANTHROPIC_API_KEY before running the workflow.'
                );
            }
            // Retries belong to the caller; one run must not silently multiply calls
            this.messages = new Anthropic({ apiKey, maxRetries: 0 }).messages;
        }
    }

    async respond(prompt: string, options: RespondOptions = {}): Promise<string> {
        const message = await this.messages.create(
            {
                model: this.options.model,
                max_tokens: this.options.maxTokens,
                temperature: this.options.temperature,
                messages: [{ role: 'user', content: prompt }],
            },
            { signal: options.signal, timeout: this.options.timeoutMs }
        );

        const text = message.content
            .map(block => (block.type === 'text' && block.text ? block.text : ''))
            .join('')
            .trim();

        if (!text) {
            throw new WorkflowError('Reasoning service returned an empty reply', 'llm_empty_response');
        }
        return text;
    }
}

export type ScriptedReply = string | Error;

/**
 * Replays a fixed list of replies in order and records every prompt it was given.
 */
export class ScriptedReasoningClient implements ReasoningClient {
    readonly prompts: string[] = [];

    constructor(private replies: ScriptedReply[]) { }

    get calls(): number {
        return this.prompts.length;
    }

    async respond(prompt: string, options: RespondOptions = {}): Promise<string> {
        if (options.signal?.aborted) {
            throw new AbortError(options.signal.reason);
        }

        const index = this.prompts.length;
        this.prompts.push(prompt);

        const reply = this.replies[index];
        if (reply === undefined) {
            throw new Error(`Scripted client has no reply for call ${index + 1}`);
        }
        if (reply instanceof Error) {
            throw reply;
        }
        return reply;
    }
}
