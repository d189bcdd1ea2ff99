/**
 * Canonical payment model shared by both wire formats.
 *
 * Instances are frozen on construction. Absent source values are `null`;
 * an empty string is a real (if unusual) value.
 */

export type MessageFormat = 'MX' | 'MT';

/** ISO 20022 charge bearer codes; MT `OUR|BEN|SHA` map onto the first three. */
export type ChargeBearer = 'DEBT' | 'CRED' | 'SHAR' | 'SLEV';

export interface PaymentMessage {
    readonly format: MessageFormat;
    /** Family discriminator: `pacs.008`, `camt.053`, `MT103`, ... */
    readonly messageType: string;
    readonly messageId: string;
    readonly endToEndId: string | null;
    /** Exact decimal string, `.` separator. */
    readonly amount: string | null;
    readonly currency: string | null;
    readonly senderBic: string | null;
    readonly receiverBic: string | null;
    readonly debtorAgentBic: string | null;
    readonly debtorName: string | null;
    readonly debtorAccount: string | null;
    readonly creditorName: string | null;
    readonly creditorAccount: string | null;
    readonly uetr: string | null;
    readonly createdAt: string | null;
    /** `YYYY-MM-DD` */
    readonly valueDate: string | null;
    readonly messageSubtype: string | null;
    readonly remittanceInfo: string | null;
    readonly chargeBearer: ChargeBearer | null;
    /** Message id this one refers back to (status reports, recalls, MT `:21:`). */
    readonly originalMessageId: string | null;
    readonly status: string | null;
    /** MX schema identifier (`pacs.008.001.02`); null for MT and unidentified namespaces. */
    readonly schema: string | null;
    readonly rawSource: Buffer | null;
}

export interface Entry {
    readonly reference: string | null;
    readonly amount: string | null;
    readonly currency: string | null;
    readonly bookingDate: string | null;
    readonly status: string | null;
    readonly creditDebit: 'CRDT' | 'DBIT' | null;
    readonly remittanceInfo: string | null;
}

export interface Balance {
    readonly type: string | null;
    readonly amount: string | null;
    readonly currency: string | null;
    readonly creditDebit: 'CRDT' | 'DBIT' | null;
    readonly date: string | null;
}

export type MessageDetails =
    | {
        readonly kind: 'payment';
        readonly settlementMethod: string | null;
        readonly numberOfTransactions: string | null;
        readonly controlSum: string | null;
    }
    | {
        readonly kind: 'statement';
        readonly statementId: string | null;
        readonly accountId: string | null;
        readonly accountCurrency: string | null;
        readonly balances: readonly Balance[];
    }
    | {
        readonly kind: 'status';
        readonly originalMessageId: string | null;
        readonly originalMessageType: string | null;
        readonly groupStatus: string | null;
    }
    | { readonly kind: 'other' };

export type DetailKind = MessageDetails['kind'];

export interface DetailedMessage extends PaymentMessage {
    readonly entries: readonly Entry[];
    readonly details: MessageDetails;
}

// ------------------ Field Table ------------------

/** Nullable text fields, in flatten order. */
export const TEXT_FIELDS = [
    'messageId',
    'endToEndId',
    'amount',
    'currency',
    'senderBic',
    'receiverBic',
    'debtorAgentBic',
    'debtorName',
    'debtorAccount',
    'creditorName',
    'creditorAccount',
    'uetr',
    'messageType',
    'createdAt',
    'valueDate',
    'messageSubtype',
    'remittanceInfo',
    'chargeBearer',
    'originalMessageId',
    'status',
] as const satisfies readonly (keyof PaymentMessage)[];

export type TextField = (typeof TEXT_FIELDS)[number];

/** Field name as exported to external collaborators (CLI, schema exporter). */
export const FLAT_FIELD_NAMES = {
    messageId: 'message_id',
    endToEndId: 'end_to_end_id',
    amount: 'amount',
    currency: 'currency',
    senderBic: 'sender_bic',
    receiverBic: 'receiver_bic',
    debtorAgentBic: 'debtor_agent_bic',
    debtorName: 'debtor_name',
    debtorAccount: 'debtor_account',
    creditorName: 'creditor_name',
    creditorAccount: 'creditor_account',
    uetr: 'uetr',
    messageType: 'message_type',
    createdAt: 'created_at',
    valueDate: 'value_date',
    messageSubtype: 'message_subtype',
    remittanceInfo: 'remittance_info',
    chargeBearer: 'charge_bearer',
    originalMessageId: 'original_message_id',
    status: 'status',
} as const satisfies Record<TextField, string>;

export type FlatFieldName = (typeof FLAT_FIELD_NAMES)[TextField];

export type FlatMessage = Readonly<Record<FlatFieldName, string | null>>;

export type PaymentMessageInit =
    Pick<PaymentMessage, 'format' | 'messageType' | 'messageId'>
    & Partial<Omit<PaymentMessage, 'format' | 'messageType' | 'messageId'>>;

/**
 * Builds a frozen message; every omitted optional field becomes `null`.
 */
export function createPaymentMessage(init: PaymentMessageInit): PaymentMessage {
    return Object.freeze({
        format: init.format,
        messageType: init.messageType,
        messageId: init.messageId,
        endToEndId: init.endToEndId ?? null,
        amount: init.amount ?? null,
        currency: init.currency ?? null,
        senderBic: init.senderBic ?? null,
        receiverBic: init.receiverBic ?? null,
        debtorAgentBic: init.debtorAgentBic ?? null,
        debtorName: init.debtorName ?? null,
        debtorAccount: init.debtorAccount ?? null,
        creditorName: init.creditorName ?? null,
        creditorAccount: init.creditorAccount ?? null,
        uetr: init.uetr ?? null,
        createdAt: init.createdAt ?? null,
        valueDate: init.valueDate ?? null,
        messageSubtype: init.messageSubtype ?? null,
        remittanceInfo: init.remittanceInfo ?? null,
        chargeBearer: init.chargeBearer ?? null,
        originalMessageId: init.originalMessageId ?? null,
        status: init.status ?? null,
        schema: init.schema ?? null,
        rawSource: init.rawSource ?? null,
    });
}

export function createDetailedMessage(
    base: PaymentMessage,
    entries: readonly Entry[],
    details: MessageDetails
): DetailedMessage {
    return Object.freeze({
        ...base,
        entries: Object.freeze(entries.map(entry => Object.freeze({ ...entry }))),
        details: Object.freeze(details),
    });
}

export function flatten(message: PaymentMessage): FlatMessage {
    const flat: FlatMessage = {
        message_id: message.messageId,
        end_to_end_id: message.endToEndId,
        amount: message.amount,
        currency: message.currency,
        sender_bic: message.senderBic,
        receiver_bic: message.receiverBic,
        debtor_agent_bic: message.debtorAgentBic,
        debtor_name: message.debtorName,
        debtor_account: message.debtorAccount,
        creditor_name: message.creditorName,
        creditor_account: message.creditorAccount,
        uetr: message.uetr,
        message_type: message.messageType,
        created_at: message.createdAt,
        value_date: message.valueDate,
        message_subtype: message.messageSubtype,
        remittance_info: message.remittanceInfo,
        charge_bearer: message.chargeBearer,
        original_message_id: message.originalMessageId,
        status: message.status,
    };
    return Object.freeze(flat);
}
