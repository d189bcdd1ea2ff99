import { ParseError } from '../errors/messageErrors.js';
import { toBic11 } from '../validation/bic.js';
import { getModuleLogger } from '../logging/logger.js';
import { MessageInput, toBuffer } from '../model/bytes.js';
import {
    Balance,
    ChargeBearer,
    createDetailedMessage,
    createPaymentMessage,
    DetailedMessage,
    Entry,
    MessageDetails,
    PaymentMessage,
} from '../model/payment.js';
import {
    MX_AMOUNT_PATHS,
    MX_CHARGE_BEARER_PATHS,
    MX_DETAIL_FIELD_MAP,
    MX_ENTRY_FIELD_MAP,
    MX_FIELD_MAP,
    MX_HEADER_FIELD_MAP,
} from './fieldMap.js';
import { MxDocument } from './lookup.js';
import { defaultProfileRegistry, MxProfile, MxProfileRegistry, parseSchemaNamespace } from './profiles.js';
import { parseXmlDocument, XmlElement } from './xmlTree.js';

const logger = getModuleLogger('mx-engine');

const CHARGE_BEARERS: readonly ChargeBearer[] = ['DEBT', 'CRED', 'SHAR', 'SLEV'];

export interface MxParseOptions {
    readonly registry?: MxProfileRegistry;
}

interface ParsedDocument {
    readonly doc: MxDocument;
    readonly profile: MxProfile | null;
    readonly messageType: string;
    readonly schema: string | null;
    /** Subtrees document-level lookups must not enter. */
    readonly skip: ReadonlySet<string> | undefined;
}

function toChargeBearer(value: string | null): ChargeBearer | null {
    if (value === null) return null;
    const code = value.trim().toUpperCase();
    return CHARGE_BEARERS.find(candidate => candidate === code) ?? null;
}

function toCreditDebit(value: string | null): 'CRDT' | 'DBIT' | null {
    const code = value?.trim().toUpperCase();
    return code === 'CRDT' || code === 'DBIT' ? code : null;
}

function openDocument(input: MessageInput, registry: MxProfileRegistry): ParsedDocument {
    const xml = toBuffer(input).toString('utf8').replace(/^\uFEFF/, '');
    const doc = MxDocument.open(parseXmlDocument(xml));
    const resolution = registry.resolve(doc.namespace, doc.messageRoot.localName);
    const profile = resolution?.profile ?? null;
    const schemaId = parseSchemaNamespace(doc.namespace);
    const messageType = schemaId?.family ?? profile?.family ?? 'unknown';

    logger.debug({
        namespace: doc.namespace,
        messageRoot: doc.messageRoot.localName,
        messageType,
        matchedBy: resolution?.matchedBy ?? null,
    }, 'MX document opened');

    const skip = profile?.detailKind === 'statement' && profile.entryElement !== null
        ? new Set([profile.entryElement])
        : undefined;

    return { doc, profile, messageType, schema: schemaId?.schema ?? null, skip };
}

function readMessage(parsed: ParsedDocument, rawSource: Buffer): PaymentMessage {
    const { doc, messageType, schema, skip } = parsed;
    const scope = doc.messageRoot;
    const text = (field: keyof typeof MX_FIELD_MAP): string | null => doc.text(scope, MX_FIELD_MAP[field], skip);
    const withHeader = (field: keyof typeof MX_HEADER_FIELD_MAP): string | null => {
        const value = text(field);
        if (value !== null || doc.header === null) return value;
        return doc.header.text(doc.header.messageRoot, MX_HEADER_FIELD_MAP[field]);
    };
    const routingBic = (field: 'senderBic' | 'receiverBic'): string | null => {
        const value = withHeader(field);
        return value === null ? null : toBic11(value);
    };

    const messageId = withHeader('messageId');
    if (messageId === null) {
        throw new ParseError('MX', `${messageType} document has no message identification (GrpHdr/MsgId or AppHdr/BizMsgIdr)`);
    }

    const { amount, currency } = doc.amount(scope, MX_AMOUNT_PATHS, skip);

    return createPaymentMessage({
        format: 'MX',
        messageType,
        messageId,
        endToEndId: text('endToEndId'),
        amount,
        currency,
        senderBic: routingBic('senderBic'),
        receiverBic: routingBic('receiverBic'),
        debtorAgentBic: text('debtorAgentBic'),
        debtorName: text('debtorName'),
        debtorAccount: text('debtorAccount'),
        creditorName: text('creditorName'),
        creditorAccount: text('creditorAccount'),
        uetr: text('uetr'),
        createdAt: withHeader('createdAt'),
        valueDate: text('valueDate'),
        messageSubtype: text('messageSubtype'),
        remittanceInfo: text('remittanceInfo'),
        chargeBearer: toChargeBearer(doc.text(scope, MX_CHARGE_BEARER_PATHS, skip)),
        originalMessageId: text('originalMessageId'),
        status: text('status'),
        schema,
        rawSource,
    });
}

function readEntry(doc: MxDocument, element: XmlElement): Entry {
    const { amount, currency } = doc.amount(element, MX_ENTRY_FIELD_MAP.amount);
    return {
        reference: doc.text(element, MX_ENTRY_FIELD_MAP.reference),
        amount,
        currency,
        bookingDate: doc.text(element, MX_ENTRY_FIELD_MAP.bookingDate),
        status: doc.text(element, MX_ENTRY_FIELD_MAP.status),
        creditDebit: toCreditDebit(doc.text(element, MX_ENTRY_FIELD_MAP.creditDebit)),
        remittanceInfo: doc.text(element, MX_ENTRY_FIELD_MAP.remittanceInfo),
    };
}

function readBalance(doc: MxDocument, element: XmlElement): Balance {
    const { amount, currency } = doc.amount(element, [['Amt']]);
    return {
        type: doc.text(element, MX_DETAIL_FIELD_MAP.balanceType),
        amount,
        currency,
        creditDebit: toCreditDebit(doc.text(element, [['CdtDbtInd']])),
        date: doc.text(element, MX_DETAIL_FIELD_MAP.balanceDate),
    };
}

function readDetails(parsed: ParsedDocument, base: PaymentMessage): MessageDetails {
    const { doc, profile, skip } = parsed;
    const scope = doc.messageRoot;

    switch (profile?.detailKind) {
        case 'payment':
            return {
                kind: 'payment',
                settlementMethod: doc.text(scope, MX_DETAIL_FIELD_MAP.settlementMethod),
                numberOfTransactions: doc.text(scope, MX_DETAIL_FIELD_MAP.numberOfTransactions),
                controlSum: doc.text(scope, MX_DETAIL_FIELD_MAP.controlSum),
            };
        case 'statement':
            return {
                kind: 'statement',
                statementId: doc.text(scope, MX_DETAIL_FIELD_MAP.statementId, skip),
                accountId: doc.text(scope, MX_DETAIL_FIELD_MAP.accountId, skip),
                accountCurrency: doc.text(scope, MX_DETAIL_FIELD_MAP.accountCurrency, skip),
                balances: doc.collect(scope, 'Bal').map(bal => readBalance(doc, bal)),
            };
        case 'status':
            return {
                kind: 'status',
                originalMessageId: base.originalMessageId,
                originalMessageType: doc.text(scope, MX_DETAIL_FIELD_MAP.originalMessageType),
                groupStatus: doc.text(scope, MX_DETAIL_FIELD_MAP.groupStatus),
            };
        default:
            return { kind: 'other' };
    }
}

/**
 * ISO 20022 (MX) reader. Namespace is read once; every field then resolves
 * through the local-name table in `fieldMap.ts`.
 */
export class MxEngine {
    /**
     * @throws ParseError on malformed XML or a missing message identification.
     */
    static parse(input: MessageInput, options: MxParseOptions = {}): PaymentMessage {
        const raw = toBuffer(input);
        const parsed = openDocument(raw, options.registry ?? defaultProfileRegistry);
        return readMessage(parsed, raw);
    }

    /** `parse` plus the entry list and the family-specific details. */
    static parseDetailed(input: MessageInput, options: MxParseOptions = {}): DetailedMessage {
        const raw = toBuffer(input);
        const parsed = openDocument(raw, options.registry ?? defaultProfileRegistry);
        const base = readMessage(parsed, raw);

        const entryElement = parsed.profile?.entryElement ?? null;
        const entries = entryElement === null
            ? []
            : parsed.doc.collect(parsed.doc.messageRoot, entryElement).map(element => readEntry(parsed.doc, element));

        logger.debug({ messageType: base.messageType, entries: entries.length }, 'MX entries extracted');
        return createDetailedMessage(base, entries, readDetails(parsed, base));
    }
}
