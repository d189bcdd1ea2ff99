import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createDetailedMessage, createPaymentMessage, flatten } from '../../libs/model/payment.js';
import { buildMessage } from '../../libs/model/schema.js';
import { ParseError } from '../../libs/errors/messageErrors.js';

describe('Canonical model', () => {
    it('fills omitted fields with null and freezes the result', () => {
        const message = createPaymentMessage({ format: 'MX', messageType: 'pacs.008', messageId: 'M-1' });

        assert.strictEqual(message.amount, null);
        assert.strictEqual(message.creditorName, null);
        assert.strictEqual(message.rawSource, null);
        assert.ok(Object.isFrozen(message));
    });

    it('flattens to snake_case names without format or raw source', () => {
        const message = createPaymentMessage({
            format: 'MT',
            messageType: 'MT103',
            messageId: 'M-2',
            amount: '10.00',
            currency: 'EUR',
            rawSource: Buffer.from('x'),
        });
        const flat = flatten(message);

        assert.strictEqual(flat.message_id, 'M-2');
        assert.strictEqual(flat.message_type, 'MT103');
        assert.strictEqual(flat.amount, '10.00');
        assert.strictEqual(flat.debtor_name, null);
        assert.strictEqual(Object.keys(flat).length, 20);
        assert.ok(!('raw_source' in flat));
        assert.ok(!('format' in flat));
    });

    it('freezes detailed entries', () => {
        const base = createPaymentMessage({ format: 'MX', messageType: 'camt.053', messageId: 'S-1' });
        const detailed = createDetailedMessage(base, [{
            reference: 'R1', amount: '1.00', currency: 'EUR', bookingDate: null,
            status: 'BOOK', creditDebit: 'CRDT', remittanceInfo: null,
        }], { kind: 'other' });

        assert.strictEqual(detailed.entries.length, 1);
        assert.ok(Object.isFrozen(detailed.entries));
        assert.ok(Object.isFrozen(detailed.entries[0]));
        assert.strictEqual(detailed.messageId, 'S-1');
    });
});

describe('buildMessage', () => {
    it('builds a frozen MT model and drops unknown keys', () => {
        const message = buildMessage('MT103', { messageId: 'B-1', amount: '100.50', currency: 'USD', colour: 'blue' });

        assert.strictEqual(message.format, 'MT');
        assert.strictEqual(message.amount, '100.50');
        assert.ok(!('colour' in message));
    });

    it('reports every violation in one ParseError', () => {
        assert.throws(
            () => buildMessage('pacs.008', { messageId: '', amount: '100', currency: 'usd' }),
            (err: unknown) => {
                assert.ok(err instanceof ParseError);
                assert.strictEqual(err.format, 'MX');
                assert.ok(err.message.includes('messageId'));
                assert.ok(err.message.includes('amount'));
                assert.ok(err.message.includes('currency'));
                return true;
            }
        );
    });
});
