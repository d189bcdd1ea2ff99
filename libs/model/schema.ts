import { z } from 'zod';
import { ParseError } from '../errors/messageErrors.js';
import { createPaymentMessage, MessageFormat, PaymentMessage } from './payment.js';

/**
 * Input validation for programmatically built messages.
 */

// --- Financial Schemas ---

export const MoneySchema = z.object({
    amount: z.string().regex(/^\d+\.\d+$/), // Canonical decimal string
    currency: z.string().length(3).regex(/^[A-Z]{3}$/), // ISO 4217
});

const optionalText = z.string().min(1).nullable().optional();

export const PaymentFieldsSchema = z.object({
    messageId: z.string().min(1).max(35),
    endToEndId: optionalText,
    amount: MoneySchema.shape.amount.nullable().optional(),
    currency: MoneySchema.shape.currency.nullable().optional(),
    senderBic: optionalText,
    receiverBic: optionalText,
    debtorAgentBic: optionalText,
    debtorName: optionalText,
    debtorAccount: optionalText,
    creditorName: optionalText,
    creditorAccount: optionalText,
    uetr: optionalText,
    createdAt: optionalText,
    valueDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable().optional(),
    messageSubtype: optionalText,
    remittanceInfo: optionalText,
    chargeBearer: z.enum(['DEBT', 'CRED', 'SHAR', 'SLEV']).nullable().optional(),
    originalMessageId: optionalText,
    status: optionalText,
});

export type PaymentFields = z.input<typeof PaymentFieldsSchema>;

const MT_TYPE = /^MT\d{3}$/;

/**
 * Builds a canonical message from loose input. Keys outside the model are
 * dropped; every schema violation is reported in one ParseError.
 */
export function buildMessage(messageType: string, fields: Record<string, unknown>): PaymentMessage {
    const result = PaymentFieldsSchema.safeParse(fields);
    const format: MessageFormat = MT_TYPE.test(messageType) ? 'MT' : 'MX';

    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ParseError(format, `invalid ${messageType} fields (${issues.join('; ')})`);
    }

    return createPaymentMessage({ ...result.data, format, messageType });
}
