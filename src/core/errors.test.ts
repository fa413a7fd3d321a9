/**
 * CORE: Error Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    CircuitBrokenError,
    ConfigError,
    ExecutionFailureError,
    InstructionNotFoundError,
    ParseFailureError,
    WorkflowError,
    describeError,
    logError,
} from './errors';
import { WorkflowLogger } from './logger';

class RecordingLogger implements WorkflowLogger {
    lines: string[] = [];
    debug(msg: string): void { this.lines.push(`debug ${msg}`); }
    info(msg: string): void { this.lines.push(`info ${msg}`); }
    error(msg: string): void { this.lines.push(`error ${msg}`); }
    success(msg: string): void { this.lines.push(`success ${msg}`); }
    warn(msg: string): void { this.lines.push(`warn ${msg}`); }
}

describe('WorkflowError', () => {
    it('toString appends the recovery hint', () => {
        const error = new WorkflowError('Something broke', 'test_broken', 'Try again.');
        assert.strictEqual(error.toString(), 'Something broke\n💡 Hint: Try again.');
    });

    it('toString is the bare message without a hint', () => {
        assert.strictEqual(new WorkflowError('Plain', 'test_plain').toString(), 'Plain');
    });

    it('keeps the cause and details', () => {
        const cause = new Error('root');
        const error = new WorkflowError('Wrapped', 'test_wrapped', undefined, { cause, details: { a: 1 } });
        assert.strictEqual(error.cause, cause);
        assert.deepStrictEqual(error.details, { a: 1 });
    });
});

describe('Error subclasses', () => {
    it('InstructionNotFoundError names the step and reason', () => {
        const error = new InstructionNotFoundError('02-check-warranty', 'invalid step id');
        assert.strictEqual(error.message, "Instruction not found for step '02-check-warranty': invalid step id");
        assert.strictEqual(error.code, 'instruction_not_found');
        assert.strictEqual(error.details.stepId, '02-check-warranty');
        assert.ok(error instanceof WorkflowError);
    });

    it('ExecutionFailureError is not cancelled by default', () => {
        const error = new ExecutionFailureError('boom', 'execution_service_failed', 'step-a');
        assert.strictEqual(error.cancelled, false);
        assert.strictEqual(error.stepId, 'step-a');
        assert.strictEqual(error.recoveryHint, 'Check the reasoning service and instruction documents, then retry the run.');
    });

    it('ExecutionFailureError carries the cancelled flag', () => {
        const error = new ExecutionFailureError('stop', 'execution_cancelled', 'step-a', { cancelled: true });
        assert.strictEqual(error.cancelled, true);
        assert.strictEqual(error.recoveryHint, 'The run was cancelled or timed out. Re-run the whole email when ready.');
    });

    it('ParseFailureError message', () => {
        const error = new ParseFailureError('01-extract-serial', 'reply has no NEXT_STEP line');
        assert.strictEqual(error.message, "Could not parse routing decision of step '01-extract-serial': reply has no NEXT_STEP line");
        assert.strictEqual(error.code, 'parse_missing_next_step');
    });

    it('CircuitBrokenError reports the ceiling and pending step', () => {
        const error = new CircuitBrokenError(3, 'step-b');
        assert.strictEqual(error.message, "Circuit breaker triggered: exceeded max steps (3) before running 'step-b'");
        assert.deepStrictEqual(error.details, { maxSteps: 3, pendingStep: 'step-b' });
    });

    it('ConfigError has a default hint', () => {
        const error = new ConfigError('bad', 'config_invalid_field');
        assert.strictEqual(error.recoveryHint, 'Fix warranty.config.json and run again.');
    });
});

describe('describeError', () => {
    it('uses the message of errors and stringifies the rest', () => {
        assert.strictEqual(describeError(new Error('x')), 'x');
        assert.strictEqual(describeError(42), '42');
    });
});

describe('logError', () => {
    it('logs code and hint of workflow errors', () => {
        const logger = new RecordingLogger();
        logError(logger, new WorkflowError('Nope', 'test_nope', 'Do this.'));
        assert.deepStrictEqual(logger.lines, [
            'error [ERROR] Nope (code: test_nope)',
            'info 💡 Hint: Do this.',
        ]);
    });

    it('logs the message of plain errors', () => {
        const logger = new RecordingLogger();
        logError(logger, new Error('plain'));
        assert.deepStrictEqual(logger.lines, ['error [ERROR] plain']);
    });
});
