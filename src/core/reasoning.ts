/**
 * CORE: Reasoning Service Boundary
 */

export interface RespondOptions {
    signal?: AbortSignal;
}

export interface ReasoningClient {
    /** Free-form reply to a rendered prompt. Rejects on transport, service or timeout errors. */
    respond(prompt: string, options?: RespondOptions): Promise<string>;
}

export class AbortError extends Error {
    constructor(reason?: unknown) {
        super(reason instanceof Error ? reason.message : 'The operation was aborted');
        this.name = 'AbortError';
    }
}

/**
 * Settles with `work`, or rejects with AbortError as soon as `signal` aborts,
 * whether or not `work` itself listens to the signal.
 */
export function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return work;
    if (signal.aborted) {
        // The abandoned promise may still reject later
        work.catch(() => undefined);
        return Promise.reject(new AbortError(signal.reason));
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new AbortError(signal.reason));
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            error => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

export interface LinkedSignal {
    signal: AbortSignal;
    dispose(): void;
}

/**
 * One signal that aborts when the caller's signal aborts or `timeoutMs` elapses.
 */
export function linkSignal(parent?: AbortSignal, timeoutMs?: number): LinkedSignal {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);

    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const timer = timeoutMs !== undefined
        ? setTimeout(() => controller.abort(new Error(`Run timed out after ${timeoutMs}ms`)), timeoutMs)
        : undefined;

    return {
        signal: controller.signal,
        dispose: () => {
            if (timer) clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        },
    };
}
