/**
 * CORE: Prompt Manager
 * Nunjucks engine wrapper. Renders the request sent to the reasoning service.
 */

import nunjucks from 'nunjucks';
import path from 'path';
import { StepContext } from './context';
import { TERMINAL_STEP } from './models';
import { PromptContext, ReplyMarker } from './types/context';

/** Closing lines every reply is asked for, in prompt order. */
export const REPLY_MARKERS: ReplyMarker[] = [
    { name: 'NEXT_STEP', hint: `next step id, or ${TERMINAL_STEP} when the workflow is finished` },
    { name: 'SERIAL', hint: 'serial number, only if you found one' },
    { name: 'WARRANTY', hint: 'warranty lookup result, only if known' },
    { name: 'TICKET', hint: 'ticket id, only if one was created' },
    { name: 'REASON', hint: 'one sentence explaining the decision' },
];

export function defaultTemplatesDir(): string {
    return path.resolve(__dirname, '../../templates/prompts');
}

/**
 * Fields of the context a step gets to see.
 */
export function buildPromptContext(stepId: string, instruction: string, context: StepContext): PromptContext {
    return {
        step: { id: stepId, instruction },
        email: { id: context.emailId, content: context.emailContent },
        facts: {
            serialNumber: context.serialNumber,
            warrantyResult: context.warrantyResult,
            ticketId: context.ticketId,
            extensions: { ...context.extensions },
        },
        protocol: { terminalStep: TERMINAL_STEP, markers: REPLY_MARKERS.map(marker => ({ ...marker })) },
    };
}

export interface PromptRenderer {
    render(templateName: string, context: PromptContext): string;
}

export class PromptManager implements PromptRenderer {
    private env: nunjucks.Environment;

    /**
     * @param customDir Searched before the bundled templates, so a deployment can override `step.njk`.
     */
    constructor(customDir?: string) {
        const searchPaths = customDir
            ? [customDir, defaultTemplatesDir()]
            : [defaultTemplatesDir()];

        const loader = new nunjucks.FileSystemLoader(searchPaths, {
            noCache: process.env.NODE_ENV !== 'production'
        });

        this.env = new nunjucks.Environment(loader, {
            autoescape: false, // Plain text prompts
            throwOnUndefined: false,
            trimBlocks: true,
            lstripBlocks: true
        });

        this.env.addFilter('json', (obj: unknown) => JSON.stringify(obj, null, 2));
    }

    public render(templateName: string, context: PromptContext): string {
        const fileName = templateName.endsWith('.njk') ? templateName : `${templateName}.njk`;
        try {
            return this.env.render(fileName, context);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to render prompt template ${fileName}: ${message}`);
        }
    }
}
