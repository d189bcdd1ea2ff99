import { getConfig } from '../bootstrap/config-guard.js';
import { getModuleLogger } from '../logging/logger.js';
import { MoneySchema } from '../model/schema.js';
import type { PaymentMessage } from '../model/payment.js';
import { validateBic } from './bic.js';
import { isIbanShaped, validateIban } from './iban.js';
import { ValidationReport, toReport } from './report.js';
import { isUetr } from './uetr.js';

const logger = getModuleLogger('logical-validator');

export interface LogicalOptions {
    /** Message types that must carry a UETR; defaults to DUALWIRE_UETR_REQUIRED_TYPES. */
    readonly uetrRequiredTypes?: readonly string[];
}

type Check = (message: PaymentMessage, options: Required<LogicalOptions>) => string[];

const bicCheck = (label: string, pick: (m: PaymentMessage) => string | null): Check => message => {
    const bic = pick(message);
    if (bic === null) return [];
    const error = validateBic(bic);
    return error === null ? [] : [`[${label}] ${error}`];
};

// Local (non-IBAN) account identifiers carry no checksum.
const accountCheck = (label: string, pick: (m: PaymentMessage) => string | null): Check => message => {
    const accountId = pick(message);
    if (accountId === null || !isIbanShaped(accountId)) return [];
    const error = validateIban(accountId);
    return error === null ? [] : [`[${label}] ${error}`];
};

/** First schema version of an MX family that defines the UETR element. */
const UETR_SINCE_VERSION: Readonly<Record<string, number>> = {
    'pacs.008': 8,
    'pacs.009': 8,
};

const SCHEMA_ID = /^([a-z]{4}\.\d{3})\.\d{3}\.(\d{2})$/;

// Unknown schemas (MT, built models) fall under the type rule alone.
function definesUetr(schema: string | null): boolean {
    const match = schema === null ? null : SCHEMA_ID.exec(schema);
    if (!match) return true;
    const since = UETR_SINCE_VERSION[match[1] ?? ''];
    return since === undefined || Number(match[2]) >= since;
}

const uetrCheck: Check = (message, options) => {
    if (message.uetr === null) {
        return options.uetrRequiredTypes.includes(message.messageType) && definesUetr(message.schema)
            ? [`[UETR] Missing; mandatory for ${message.schema ?? message.messageType}`]
            : [];
    }
    return isUetr(message.uetr) ? [] : [`[UETR] '${message.uetr}' is not a version 4 UUID`];
};

const moneyCheck: Check = message => {
    const errors: string[] = [];
    if (message.amount !== null && !MoneySchema.shape.amount.safeParse(message.amount).success) {
        errors.push(`[Amount] '${message.amount}' is not a decimal amount`);
    }
    if (message.currency !== null && !MoneySchema.shape.currency.safeParse(message.currency).success) {
        errors.push(`[Currency] '${message.currency}' is not an ISO 4217 code`);
    }
    return errors;
};

const CHECKS: readonly Check[] = [
    bicCheck('Sender', m => m.senderBic),
    bicCheck('Receiver', m => m.receiverBic),
    bicCheck('Debtor Agent', m => m.debtorAgentBic),
    accountCheck('Debtor Account', m => m.debtorAccount),
    accountCheck('Creditor Account', m => m.creditorAccount),
    uetrCheck,
    moneyCheck,
];

/**
 * Business-rule checks over a parsed model. Every check runs; failures are
 * collected, never thrown.
 */
export class LogicalValidator {
    static validate(message: PaymentMessage, options: LogicalOptions = {}): ValidationReport {
        const resolved: Required<LogicalOptions> = {
            uetrRequiredTypes: options.uetrRequiredTypes ?? getConfig().uetrRequiredTypes,
        };
        const errors = CHECKS.flatMap(check => check(message, resolved));
        logger.debug({ messageType: message.messageType, errors: errors.length }, 'Logical validation finished');
        return toReport(errors);
    }
}
