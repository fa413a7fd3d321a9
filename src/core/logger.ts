export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface WorkflowLogger {
    debug(msg: string, ...args: unknown[]): void;
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class ConsoleLogger implements WorkflowLogger {
    private threshold: number;

    constructor(level: LogLevel = 'info') {
        this.threshold = LEVEL_ORDER[level];
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= this.threshold;
    }

    debug(msg: string, ...args: unknown[]): void {
        if (this.enabled('debug')) console.debug(msg, ...args);
    }

    info(msg: string, ...args: unknown[]): void {
        if (this.enabled('info')) console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        if (this.enabled('error')) console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        if (this.enabled('info')) console.log(msg, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        if (this.enabled('warn')) console.warn(msg, ...args);
    }
}

export class SilentLogger implements WorkflowLogger {
    debug(): void { }
    info(): void { }
    error(): void { }
    success(): void { }
    warn(): void { }
}
