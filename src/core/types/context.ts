/**
 * CORE: Prompt Context
 * Strict ViewModel for Nunjucks templates.
 */

export interface ReplyMarker {
    name: string;
    /** What the model should put after the marker. */
    hint: string;
}

export interface PromptContext {
    /** 1. Step */
    step: {
        id: string;
        instruction: string;
    };

    /** 2. Email */
    email: {
        id: string;
        content: string;
    };

    /** 3. Known facts from earlier steps */
    facts: {
        serialNumber?: string;
        warrantyResult?: string;
        ticketId?: string;
        extensions: Record<string, string>;
    };

    /** 4. Reply protocol */
    protocol: {
        terminalStep: string;
        markers: ReplyMarker[];
    };
}
