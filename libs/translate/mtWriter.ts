import crypto from 'crypto';
import { toCommaDecimal } from '../model/decimal.js';
import type { ChargeBearer, PaymentMessage } from '../model/payment.js';
import { bicToLt } from '../mt/address.js';
import { toYymmdd } from '../mt/fields.js';
import type { WriteContext } from './mxWriter.js';

export type MtTarget = '103' | '202';

const CHARGE_CODES: Readonly<Record<ChargeBearer, string | null>> = {
    DEBT: 'OUR',
    CRED: 'BEN',
    SHAR: 'SHA',
    // No MT equivalent.
    SLEV: null,
};

function partyLines(accountId: string | null, name: string | null): string | null {
    const lines = [accountId === null ? null : `/${accountId}`, name].filter((line): line is string => line !== null);
    return lines.length > 0 ? lines.join('\n') : null;
}

function valueDateAmount(model: PaymentMessage, context: WriteContext): string | null {
    if (model.amount === null || model.currency === null) return null;
    const date = toYymmdd(model.valueDate ?? context.now.toISOString());
    return date === null ? null : `${date}${model.currency}${toCommaDecimal(model.amount)}`;
}

function block4(target: MtTarget, model: PaymentMessage, context: WriteContext): [string, string | null][] {
    const field32A = valueDateAmount(model, context);
    if (target === '202') {
        return [
            ['20', model.messageId],
            // Mandatory related reference.
            ['21', model.originalMessageId ?? 'NONREF'],
            ['32A', field32A],
            ['52A', model.debtorAgentBic],
        ];
    }
    return [
        ['20', model.messageId],
        ['21', model.originalMessageId],
        ['23B', model.messageSubtype],
        ['32A', field32A],
        ['50K', partyLines(model.debtorAccount, model.debtorName)],
        ['52A', model.debtorAgentBic],
        ['59', partyLines(model.creditorAccount, model.creditorName)],
        ['70', model.remittanceInfo],
        ['71A', model.chargeBearer === null ? null : CHARGE_CODES[model.chargeBearer]],
    ];
}

export function writeMt(target: MtTarget, model: PaymentMessage, context: WriteContext): Buffer {
    const uetr = model.uetr ?? (context.generateUetr ? crypto.randomUUID() : null);
    const header = [
        `{1:F01${bicToLt(model.senderBic)}0000000000}`,
        `{2:I${target}${bicToLt(model.receiverBic)}N}`,
        uetr === null ? '' : `{3:{121:${uetr}}}`,
    ].join('');

    const fields = block4(target, model, context)
        .filter((field): field is [string, string] => field[1] !== null)
        .map(([tag, value]) => `:${tag}:${value}`);

    return Buffer.from(`${header}{4:\n${fields.join('\n')}\n-}`, 'utf8');
}
