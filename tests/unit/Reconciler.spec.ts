import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Reconciler } from '../../libs/reconcile/reconciler.js';
import { MxEngine } from '../../libs/iso20022/mxEngine.js';
import { MtEngine } from '../../libs/mt/mtEngine.js';
import { createPaymentMessage, PaymentMessageInit } from '../../libs/model/payment.js';
import { MT_103, PACS_002, PACS_008 } from '../fixtures/messages.js';

const message = (messageId: string, fields: Partial<PaymentMessageInit> = {}) => createPaymentMessage({
    format: 'MX',
    messageType: 'pacs.008',
    messageId,
    ...fields,
});

describe('Reconciler.isMatch', () => {
    const a = message('A', { endToEndId: 'E1', amount: '100.00', currency: 'EUR' });

    it('links on UETR across formats', () => {
        assert.strictEqual(Reconciler.isMatch(MxEngine.parse(PACS_008), MtEngine.parse(MT_103)), true);
    });

    it('links on end-to-end id and on original message id in either direction', () => {
        const report = message('S', { originalMessageId: 'A' });

        assert.strictEqual(Reconciler.isMatch(a, message('B', { endToEndId: 'E1' })), true);
        assert.strictEqual(Reconciler.isMatch(a, report), true);
        assert.strictEqual(Reconciler.isMatch(report, a), true);
        assert.strictEqual(Reconciler.isMatch(a, message('X')), false);
    });

    it('applies the amount check', () => {
        const lower = message('B', { endToEndId: 'E1', amount: '99.50', currency: 'EUR' });
        const muchLower = message('C', { endToEndId: 'E1', amount: '98.00', currency: 'EUR' });

        assert.strictEqual(Reconciler.isMatch(a, lower), true);
        assert.strictEqual(Reconciler.isMatch(a, lower, { amountCheck: 'exact' }), false);
        assert.strictEqual(Reconciler.isMatch(a, lower, { amountCheck: 'tolerant' }), true);
        assert.strictEqual(Reconciler.isMatch(a, muchLower, { amountCheck: 'tolerant' }), false);
        assert.strictEqual(Reconciler.isMatch(a, message('D', { endToEndId: 'E1', amount: '100.0', currency: 'EUR' }), { amountCheck: 'exact' }), true);
    });

    it('does not fail the amount check on missing amounts or other currencies', () => {
        assert.strictEqual(Reconciler.isMatch(a, message('B', { endToEndId: 'E1' }), { amountCheck: 'exact' }), true);
        assert.strictEqual(
            Reconciler.isMatch(a, message('B', { endToEndId: 'E1', amount: '5.00', currency: 'USD' }), { amountCheck: 'exact' }),
            true
        );
    });
});

describe('Reconciler.findMatches', () => {
    it('returns matching candidates in order without the primary', () => {
        const a = message('A', { endToEndId: 'E1' });
        const b = message('B', { endToEndId: 'E1' });
        const c = message('C', { originalMessageId: 'A' });

        assert.deepStrictEqual(Reconciler.findMatches(a, [c, a, message('X'), b]), [c, b]);
    });
});

describe('Reconciler.traceLifecycle', () => {
    it('follows links transitively and keeps pool order without timestamps', () => {
        const a = message('A', { endToEndId: 'E1' });
        const b = message('B', { endToEndId: 'E1' });
        const report = message('S2', { originalMessageId: 'B' });
        const unrelated = message('X');

        const timeline = Reconciler.traceLifecycle(a, [report, unrelated, b, a]);
        assert.deepStrictEqual(timeline.map(m => m.messageId), ['S2', 'B', 'A']);
    });

    it('sorts timestamped members among themselves', () => {
        const a = message('A', { endToEndId: 'E1', createdAt: '2024-03-01T09:00:00Z' });
        const b = message('B', { endToEndId: 'E1' });
        const report = message('S2', { originalMessageId: 'B', createdAt: '2024-03-01T11:00:00Z' });

        const timeline = Reconciler.traceLifecycle(a, [report, b, a]);
        assert.deepStrictEqual(timeline.map(m => m.messageId), ['A', 'B', 'S2']);
    });

    it('puts a seed outside the pool first and lists each message once', () => {
        const a = message('A', { endToEndId: 'E1' });
        const b = message('B', { endToEndId: 'E1' });

        assert.deepStrictEqual(Reconciler.traceLifecycle(a, [b, b]).map(m => m.messageId), ['A', 'B']);
    });

    it('returns only the seed when nothing links', () => {
        const a = message('A', { endToEndId: 'E1' });
        assert.deepStrictEqual(Reconciler.traceLifecycle(a, [message('X'), message('Y', { endToEndId: 'E2' })]), [a]);
    });

    it('traces a payment across MX and MT', () => {
        const payment = MxEngine.parse(PACS_008);
        const status = MxEngine.parse(PACS_002);
        const relay = MtEngine.parse(MT_103);

        const timeline = Reconciler.traceLifecycle(payment, [status, relay]);
        assert.deepStrictEqual(timeline, [payment, status, relay]);
    });

    it('keeps contradictory status reports', () => {
        const a = message('A');
        const accepted = message('S1', { originalMessageId: 'A', status: 'ACSC' });
        const rejected = message('S2', { originalMessageId: 'A', status: 'RJCT' });

        const timeline = Reconciler.traceLifecycle(a, [accepted, rejected]);
        assert.deepStrictEqual(timeline.map(m => m.status), [null, 'ACSC', 'RJCT']);
    });
});
