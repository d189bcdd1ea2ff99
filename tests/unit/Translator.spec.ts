import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Translator } from '../../libs/translate/translator.js';
import { MxEngine } from '../../libs/iso20022/mxEngine.js';
import { MtEngine } from '../../libs/mt/mtEngine.js';
import { createPaymentMessage } from '../../libs/model/payment.js';
import { UnsupportedFormatError } from '../../libs/errors/messageErrors.js';
import { MT_103, MT_202, PACS_002, PACS_008, PACS_008_V02_NO_CREDITOR_NAME, UETR } from '../fixtures/messages.js';

const clock = () => new Date('2024-05-01T12:00:00.000Z');
const V4_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('Translator.toMx', () => {
    it('writes a pacs.008 document with the XML declaration and namespace', () => {
        const xml = Translator.toMx(MxEngine.parse(PACS_008), 'pacs.008').toString('utf8');

        assert.ok(xml.startsWith(
            '<?xml version="1.0" encoding="UTF-8"?>\n<Document xmlns="urn:iso:std:iso:20022:tech:xsd:pacs.008.001.08">'
        ));
        assert.ok(xml.includes('<CreDtTm>2024-03-01T09:30:00</CreDtTm>'));
    });

    it('carries an MT103 into pacs.008', () => {
        const source = MtEngine.parse(MT_103);
        const message = MxEngine.parse(Translator.toMx(source, 'pacs.008', { clock }));

        assert.strictEqual(message.messageType, 'pacs.008');
        assert.strictEqual(message.messageId, 'MT-REF-1');
        assert.strictEqual(message.endToEndId, 'NOTPROVIDED');
        assert.strictEqual(message.amount, '50000.00');
        assert.strictEqual(message.currency, 'EUR');
        assert.strictEqual(message.valueDate, '2024-03-01');
        assert.strictEqual(message.createdAt, '2024-05-01T12:00:00Z');
        assert.strictEqual(message.senderBic, 'BANKUS33XXX');
        assert.strictEqual(message.receiverBic, 'BANKGB22XXX');
        assert.strictEqual(message.debtorName, 'ALICE EXAMPLE');
        assert.strictEqual(message.debtorAccount, 'GB29NWBK60161331926819');
        assert.strictEqual(message.debtorAgentBic, 'NWBKGB2L');
        assert.strictEqual(message.creditorName, 'BOB EXAMPLE');
        assert.strictEqual(message.creditorAccount, '12345678');
        assert.strictEqual(message.uetr, UETR);
        assert.strictEqual(message.remittanceInfo, 'INVOICE 42');
        assert.strictEqual(message.chargeBearer, 'SHAR');
        assert.strictEqual(message.messageSubtype, null);
    });

    it('writes BIC and no UETR for pacs.008.001.02', () => {
        const xml = Translator.toMx(MxEngine.parse(PACS_008), 'pacs.008.001.02', { generateUetr: true }).toString('utf8');

        assert.ok(xml.includes('xmlns="urn:iso:std:iso:20022:tech:xsd:pacs.008.001.02"'));
        assert.ok(xml.includes('<BIC>NWBKGB2L</BIC>'));
        assert.ok(!xml.includes('<BICFI>'));
        assert.ok(!xml.includes('<UETR>'));
    });

    it('leaves out an amount that has no currency', () => {
        const model = createPaymentMessage({ format: 'MT', messageType: 'MT103', messageId: 'NO-CCY', amount: '10.00' });
        const xml = Translator.toMx(model, 'pacs.008', { clock });

        assert.ok(!xml.toString('utf8').includes('IntrBkSttlmAmt'));
        assert.strictEqual(MxEngine.parse(xml).amount, null);
    });

    it('writes a pain.001 initiation', () => {
        const detailed = MxEngine.parseDetailed(Translator.toMx(MtEngine.parse(MT_103), 'pain.001'));

        assert.strictEqual(detailed.messageType, 'pain.001');
        assert.strictEqual(detailed.messageId, 'MT-REF-1');
        assert.strictEqual(detailed.amount, '50000.00');
        assert.strictEqual(detailed.currency, 'EUR');
        assert.strictEqual(detailed.valueDate, '2024-03-01');
        assert.strictEqual(detailed.debtorName, 'ALICE EXAMPLE');
        assert.deepStrictEqual(detailed.details, {
            kind: 'payment', settlementMethod: null, numberOfTransactions: '1', controlSum: '50000.00',
        });
    });

    it('writes an undated execution date for pain.001.001.03', () => {
        const xml = Translator.toMx(MtEngine.parse(MT_103), 'pain.001.001.03').toString('utf8');

        assert.ok(xml.includes('<ReqdExctnDt>2024-03-01</ReqdExctnDt>'));
        assert.strictEqual(MxEngine.parse(xml).valueDate, '2024-03-01');
    });

    it('writes a pacs.002 status report', () => {
        const detailed = MxEngine.parseDetailed(Translator.toMx(MxEngine.parse(PACS_002), 'pacs.002'));

        assert.strictEqual(detailed.messageId, 'STS-0001');
        assert.strictEqual(detailed.originalMessageId, 'MSG-0001');
        assert.strictEqual(detailed.endToEndId, 'E2E-0001');
        assert.strictEqual(detailed.uetr, UETR);
        assert.strictEqual(detailed.status, 'ACSC');
        assert.deepStrictEqual(detailed.details, {
            kind: 'status', originalMessageId: 'MSG-0001', originalMessageType: 'pacs.008', groupStatus: null,
        });
    });

    it('reports on a payment with placeholders and the original transaction', () => {
        const message = MxEngine.parse(Translator.toMx(MxEngine.parse(PACS_008), 'pacs.002'));

        assert.strictEqual(message.originalMessageId, 'NOTPROVIDED');
        assert.strictEqual(message.status, null);
        assert.strictEqual(message.amount, '50000.00');
        assert.strictEqual(message.debtorName, 'Alice Example');
        assert.strictEqual(message.creditorName, 'Bob Example');
    });

    it('mints a UETR only when asked', () => {
        const model = MtEngine.parse(MT_202);

        assert.strictEqual(MxEngine.parse(Translator.toMx(model, 'pacs.008')).uetr, null);
        assert.match(MxEngine.parse(Translator.toMx(model, 'pacs.008', { generateUetr: true })).uetr ?? '', V4_UUID);
    });

    it('rejects unsupported schemas', () => {
        assert.throws(
            () => Translator.toMx(MxEngine.parse(PACS_008), 'camt.053'),
            (err: unknown) => err instanceof UnsupportedFormatError && err.target === 'camt.053'
        );
    });
});

describe('Translator.toMt', () => {
    it('writes an MT103 from a parsed MT103', () => {
        const mt = Translator.toMt(MtEngine.parse(MT_103), '103').toString('utf8');

        assert.strictEqual(mt, [
            `{1:F01BANKUS33AXXX0000000000}{2:I103BANKGB22AXXXN}{3:{121:${UETR}}}{4:`,
            ':20:MT-REF-1',
            ':23B:CRED',
            ':32A:240301EUR50000,00',
            ':50K:/GB29NWBK60161331926819',
            'ALICE EXAMPLE',
            ':52A:NWBKGB2L',
            ':59:/12345678',
            'BOB EXAMPLE',
            ':70:INVOICE 42',
            ':71A:SHA',
            '-}',
        ].join('\n'));
    });

    it('reproduces an MT202 byte for byte', () => {
        assert.strictEqual(Translator.toMt(MtEngine.parse(MT_202), 'MT202').toString('utf8'), MT_202);
    });

    it('carries a pacs.008 into MT103', () => {
        const message = MtEngine.parse(Translator.toMt(MxEngine.parse(PACS_008), 'MT103'));

        assert.strictEqual(message.messageId, 'MSG-0001');
        assert.strictEqual(message.senderBic, 'DEUTDEFFXXX');
        assert.strictEqual(message.receiverBic, 'NWBKGB2LXXX');
        assert.strictEqual(message.amount, '50000.00');
        assert.strictEqual(message.currency, 'EUR');
        assert.strictEqual(message.valueDate, '2024-03-01');
        assert.strictEqual(message.debtorName, 'Alice Example');
        assert.strictEqual(message.creditorAccount, '12345678');
        assert.strictEqual(message.uetr, UETR);
        assert.strictEqual(message.chargeBearer, 'SHAR');
    });

    it('keeps an 8-character routing BIC stable through MT103', () => {
        const source = MxEngine.parse(PACS_008_V02_NO_CREDITOR_NAME);
        const mt = Translator.toMt(source, 'MT103', { clock }).toString('utf8');
        const back = MtEngine.parse(mt);

        assert.ok(mt.startsWith('{1:F01DEUTDEFFAXXX0000000000}{2:I103XXXXXXXXXXXXN}'));
        assert.strictEqual(source.senderBic, 'DEUTDEFFXXX');
        assert.strictEqual(back.senderBic, source.senderBic);
        assert.strictEqual(back.receiverBic, source.receiverBic);
        assert.strictEqual(MxEngine.parse(Translator.toMx(back, 'pacs.008', { clock })).senderBic, 'DEUTDEFFXXX');
    });

    it('writes NONREF for a missing MT202 related reference', () => {
        const mt = Translator.toMt(MtEngine.parse(MT_202.replace('RELREF123', 'NONREF')), '202').toString('utf8');

        assert.ok(mt.includes('\n:21:NONREF\n'));
        assert.strictEqual(MtEngine.parse(mt).originalMessageId, null);
    });

    it('omits 71A for SLEV and dates 32A from the clock', () => {
        const model = createPaymentMessage({
            format: 'MX',
            messageType: 'pacs.008',
            messageId: 'M-1',
            amount: '10.00',
            currency: 'USD',
            chargeBearer: 'SLEV',
        });
        const mt = Translator.toMt(model, '103', { clock }).toString('utf8');

        assert.strictEqual(mt, [
            '{1:F01XXXXXXXXXXXX0000000000}{2:I103XXXXXXXXXXXXN}{4:',
            ':20:M-1',
            ':32A:240501USD10,00',
            '-}',
        ].join('\n'));
    });

    it('rejects unsupported message types', () => {
        assert.throws(
            () => Translator.toMt(MtEngine.parse(MT_103), '940'),
            (err: unknown) => err instanceof UnsupportedFormatError && err.supported.join(',') === 'MT103,MT202'
        );
    });
});
