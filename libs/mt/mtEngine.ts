import { ParseError } from '../errors/messageErrors.js';
import { getModuleLogger } from '../logging/logger.js';
import { MessageInput, toBuffer } from '../model/bytes.js';
import {
    ChargeBearer,
    createDetailedMessage,
    createPaymentMessage,
    DetailedMessage,
    Entry,
    MessageDetails,
    PaymentMessage,
} from '../model/payment.js';
import { ltToBic } from './address.js';
import {
    MtField,
    parseBlockTwo,
    parseCurrencyAmount,
    parseParty,
    parseValueDateAmount,
    Party,
    readFields,
    tagMap,
    toIsoDate,
} from './fields.js';
import { parseStatement } from './statement.js';
import { MtBlocks, tokenizeMt } from './tokenizer.js';

const logger = getModuleLogger('mt-engine');

const STATEMENT_TYPES = new Set(['940', '942', '950']);
const PAYMENT_TYPES = new Set(['101', '102', '103', '200', '202', '205']);
const CANCELLATION_TYPES = new Set(['192', '196', '292', '296']);

const DEBTOR_TAGS = ['50K', '50F', '50A', '50H', '50'] as const;
const CREDITOR_TAGS = ['59', '59F', '59A'] as const;

const CHARGE_CODES: Readonly<Record<string, ChargeBearer>> = {
    OUR: 'DEBT',
    BEN: 'CRED',
    SHA: 'SHAR',
};

const BLOCK1_ADDRESS = /^[A-Z]\d{2}([A-Z0-9]{12})/;

interface ParsedMt {
    readonly blocks: MtBlocks;
    readonly mtType: string | null;
    readonly fields: readonly MtField[];
    readonly tags: ReadonlyMap<string, string>;
}

function open(raw: Buffer): ParsedMt {
    const { blocks, issues } = tokenizeMt(raw.toString('utf8'));
    const [firstIssue] = issues;
    if (firstIssue) {
        throw new ParseError('MT', firstIssue.message);
    }
    if (blocks.block4 === null) {
        throw new ParseError('MT', 'missing block 4');
    }

    const blockTwo = parseBlockTwo(blocks.block2);
    if (blocks.block2 !== null && blockTwo === null) {
        logger.warn({ block2: blocks.block2 }, 'Unrecognized application header, message type unknown');
    }

    const fields = readFields(blocks.block4);
    logger.debug({ mtType: blockTwo?.mtType ?? null, fields: fields.length }, 'MT message tokenized');

    return { blocks, mtType: blockTwo?.mtType ?? null, fields, tags: tagMap(fields) };
}

function firstParty(tags: ReadonlyMap<string, string>, candidates: readonly string[]): Party | null {
    for (const tag of candidates) {
        const value = tags.get(tag);
        if (value !== undefined) return parseParty(value, tag.slice(2));
    }
    return null;
}

function text(tags: ReadonlyMap<string, string>, tag: string): string | null {
    return tags.get(tag)?.trim() || null;
}

function readMessage(parsed: ParsedMt, rawSource: Buffer): PaymentMessage {
    const { blocks, mtType, tags } = parsed;

    const messageId = text(tags, '20');
    if (messageId === null) {
        throw new ParseError('MT', 'mandatory field :20: missing');
    }

    let amount: string | null = null;
    let currency: string | null = null;
    let valueDate: string | null = null;

    const field32A = tags.get('32A');
    if (field32A !== undefined) {
        const parsed32A = parseValueDateAmount(field32A);
        if (parsed32A) {
            ({ amount, currency, valueDate } = parsed32A);
        } else {
            logger.warn({ messageId }, 'Unparseable :32A: value, amount and currency treated as absent');
        }
    } else {
        const field32B = tags.get('32B');
        const parsed32B = field32B === undefined ? null : parseCurrencyAmount(field32B);
        if (parsed32B) ({ amount, currency } = parsed32B);
        const field30 = tags.get('30');
        valueDate = field30 === undefined ? null : toIsoDate(field30.trim());
    }

    const senderAddress = blocks.block1 === null ? null : BLOCK1_ADDRESS.exec(blocks.block1)?.[1] ?? null;
    const blockTwo = parseBlockTwo(blocks.block2);
    const debtor = firstParty(tags, DEBTOR_TAGS);
    const creditor = firstParty(tags, CREDITOR_TAGS);
    const agent = firstParty(tags, ['52A']);
    const related = text(tags, '21');
    const charges = text(tags, '71A');

    return createPaymentMessage({
        format: 'MT',
        messageType: mtType === null ? 'unknown' : `MT${mtType}`,
        messageId,
        amount,
        currency,
        senderBic: senderAddress === null ? null : ltToBic(senderAddress),
        receiverBic: blockTwo === null ? null : ltToBic(blockTwo.receiverAddress),
        debtorAgentBic: agent?.bic ?? null,
        debtorName: debtor?.name ?? null,
        debtorAccount: debtor?.account ?? null,
        creditorName: creditor?.name ?? null,
        creditorAccount: creditor?.account ?? null,
        uetr: blocks.block3?.get('121')?.trim() || null,
        valueDate,
        messageSubtype: text(tags, '23B'),
        remittanceInfo: text(tags, '70'),
        chargeBearer: charges === null ? null : CHARGE_CODES[charges] ?? null,
        // NONREF marks the absence of a related reference.
        originalMessageId: related === 'NONREF' ? null : related,
        rawSource,
    });
}

function paymentEntry(base: PaymentMessage): Entry {
    return {
        reference: base.messageId,
        amount: base.amount,
        currency: base.currency,
        bookingDate: base.valueDate,
        status: null,
        creditDebit: null,
        remittanceInfo: base.remittanceInfo,
    };
}

/**
 * SWIFT FIN (MT) reader: block tokenizer, then a tag table over block 4.
 */
export class MtEngine {
    /**
     * @throws ParseError on broken block structure or a missing `:20:`.
     */
    static parse(input: MessageInput): PaymentMessage {
        const raw = toBuffer(input);
        return readMessage(open(raw), raw);
    }

    static parseDetailed(input: MessageInput): DetailedMessage {
        const raw = toBuffer(input);
        const parsed = open(raw);
        const base = readMessage(parsed, raw);
        const mtType = parsed.mtType ?? '';

        if (STATEMENT_TYPES.has(mtType)) {
            const statement = parseStatement(parsed.fields, mtType);
            const details: MessageDetails = {
                kind: 'statement',
                statementId: statement.statementId,
                accountId: statement.accountId,
                accountCurrency: statement.currency,
                balances: statement.balances,
            };
            return createDetailedMessage(base, statement.entries, details);
        }

        if (PAYMENT_TYPES.has(mtType)) {
            const details: MessageDetails = {
                kind: 'payment',
                settlementMethod: null,
                numberOfTransactions: '1',
                controlSum: null,
            };
            return createDetailedMessage(base, [paymentEntry(base)], details);
        }

        if (CANCELLATION_TYPES.has(mtType)) {
            const original = /^(\d{3})/.exec(parsed.tags.get('11S')?.trim() ?? '')?.[1];
            const details: MessageDetails = {
                kind: 'status',
                originalMessageId: base.originalMessageId,
                originalMessageType: original === undefined ? null : `MT${original}`,
                groupStatus: parsed.tags.get('76')?.split('\n')[0]?.trim() || null,
            };
            return createDetailedMessage(base, [], details);
        }

        return createDetailedMessage(base, [], { kind: 'other' });
    }
}
