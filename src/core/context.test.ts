/**
 * CORE: Step Context Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { applyStepFields, createStepContext } from './context';

describe('createStepContext', () => {
    it('copies the extensions map', () => {
        const extensions = { channel: 'email' };
        const ctx = createStepContext({ emailId: 'e1', emailContent: 'hi', extensions });
        extensions.channel = 'changed';
        assert.deepStrictEqual(ctx.extensions, { channel: 'email' });
    });

    it('starts with no extracted facts', () => {
        const ctx = createStepContext({ emailId: 'e1', emailContent: 'hi' });
        assert.strictEqual(ctx.serialNumber, undefined);
        assert.strictEqual(ctx.warrantyResult, undefined);
        assert.strictEqual(ctx.ticketId, undefined);
        assert.deepStrictEqual(ctx.extensions, {});
    });
});

describe('applyStepFields', () => {
    it('returns a new context and leaves the input untouched', () => {
        const ctx = createStepContext({ emailId: 'e1', emailContent: 'hi' });
        const next = applyStepFields(ctx, { serial: 'SN-1', reason: 'found it' });

        assert.notStrictEqual(next, ctx);
        assert.notStrictEqual(next.extensions, ctx.extensions);
        assert.strictEqual(ctx.serialNumber, undefined);
        assert.deepStrictEqual(ctx.extensions, {});
        assert.strictEqual(next.serialNumber, 'SN-1');
        assert.deepStrictEqual(next.extensions, { reason: 'found it' });
    });

    it('keeps typed fields out of the extensions', () => {
        const ctx = createStepContext({ emailId: 'e1', emailContent: 'hi' });
        const next = applyStepFields(ctx, { serial: 'SN-1', warranty: 'valid', ticket: 'T-1' });
        assert.deepStrictEqual(next.extensions, {});
        assert.strictEqual(next.warrantyResult, 'valid');
    });

    it('keeps previous values when fields are absent', () => {
        const ctx = createStepContext({
            emailId: 'e1',
            emailContent: 'hi',
            serialNumber: 'SN-1',
            warrantyResult: 'valid',
            ticketId: 'T-1',
        });
        const next = applyStepFields(ctx, {});
        assert.strictEqual(next.serialNumber, 'SN-1');
        assert.strictEqual(next.warrantyResult, 'valid');
        assert.strictEqual(next.ticketId, 'T-1');
    });

    it('ignores blank values', () => {
        const ctx = createStepContext({ emailId: 'e1', emailContent: 'hi', serialNumber: 'SN-1' });
        const next = applyStepFields(ctx, { serial: '   ', ticket: '' });
        assert.strictEqual(next.serialNumber, 'SN-1');
        assert.strictEqual(next.ticketId, undefined);
        assert.deepStrictEqual(next.extensions, {});
    });

    it('replaces a value the step reports again', () => {
        const ctx = createStepContext({ emailId: 'e1', emailContent: 'hi', warrantyResult: 'unknown' });
        const next = applyStepFields(ctx, { warranty: 'expired', ticket: 'T-9' });
        assert.strictEqual(next.warrantyResult, 'expired');
        assert.strictEqual(next.ticketId, 'T-9');
    });
});
