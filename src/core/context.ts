/**
 * CORE: Step Context
 * Workflow state threaded through a run. Replaced after every step, never mutated in place.
 */

export interface StepContext {
    emailId: string;
    /** Raw email text as received. */
    emailContent: string;
    serialNumber?: string;
    warrantyResult?: string;
    ticketId?: string;
    /** Step fields without a typed slot above, e.g. `reason`. */
    extensions: Record<string, string>;
}

export interface StepContextInit {
    emailId: string;
    emailContent: string;
    serialNumber?: string;
    warrantyResult?: string;
    ticketId?: string;
    extensions?: Record<string, string>;
}

/**
 * Auxiliary fields a step reply may carry besides its routing decision.
 */
export interface StepFields {
    serial?: string;
    reason?: string;
    warranty?: string;
    ticket?: string;
}

function present(value: string | undefined): value is string {
    return value !== undefined && value.trim().length > 0;
}

export function createStepContext(init: StepContextInit): StepContext {
    return {
        emailId: init.emailId,
        emailContent: init.emailContent,
        serialNumber: init.serialNumber,
        warrantyResult: init.warrantyResult,
        ticketId: init.ticketId,
        extensions: { ...init.extensions },
    };
}

/**
 * Produce the context for the next step.
 * Absent or blank fields keep the previous value; a new value replaces it.
 */
export function applyStepFields(context: StepContext, fields: StepFields): StepContext {
    const { serial, warranty, ticket, ...untyped } = fields;
    const extensions = { ...context.extensions };
    for (const [key, value] of Object.entries(untyped)) {
        if (present(value)) extensions[key] = value;
    }

    return {
        emailId: context.emailId,
        emailContent: context.emailContent,
        serialNumber: present(serial) ? serial : context.serialNumber,
        warrantyResult: present(warranty) ? warranty : context.warrantyResult,
        ticketId: present(ticket) ? ticket : context.ticketId,
        extensions,
    };
}
