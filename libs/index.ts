import { getConfig } from './bootstrap/config-guard.js';
import { detectFormat } from './detect/formatDetector.js';
import { MxEngine } from './iso20022/mxEngine.js';
import type { MessageInput } from './model/bytes.js';
import type { DetailedMessage, PaymentMessage } from './model/payment.js';
import { MtEngine } from './mt/mtEngine.js';

/**
 * Parses MX or MT bytes into the canonical model.
 * @throws FormatError when neither signature is found
 * @throws ParseError on malformed structure or a missing message id
 */
export function parse(input: MessageInput): PaymentMessage {
    return detectFormat(input, getConfig().detectPrefixBytes) === 'MX'
        ? MxEngine.parse(input)
        : MtEngine.parse(input);
}

/** `parse` plus entries and family-specific details. */
export function parseDetailed(input: MessageInput): DetailedMessage {
    return detectFormat(input, getConfig().detectPrefixBytes) === 'MX'
        ? MxEngine.parseDetailed(input)
        : MtEngine.parseDetailed(input);
}

export { detectFormat, DEFAULT_PREFIX_BYTES } from './detect/formatDetector.js';
export { flatten, createPaymentMessage, FLAT_FIELD_NAMES, TEXT_FIELDS } from './model/payment.js';
export type {
    Balance,
    ChargeBearer,
    DetailedMessage,
    DetailKind,
    Entry,
    FlatFieldName,
    FlatMessage,
    MessageDetails,
    MessageFormat,
    PaymentMessage,
} from './model/payment.js';
export type { MessageInput } from './model/bytes.js';
export { buildMessage } from './model/schema.js';
export type { PaymentFields } from './model/schema.js';

export { MxEngine } from './iso20022/mxEngine.js';
export { MtEngine } from './mt/mtEngine.js';
export { MxProfileRegistry, defaultProfileRegistry, DEFAULT_PROFILES } from './iso20022/profiles.js';
export type { MxProfile } from './iso20022/profiles.js';
export { Translator } from './translate/translator.js';
export type { TranslateOptions } from './translate/translator.js';
export { Validator } from './validation/validator.js';
export type { ValidationReport } from './validation/report.js';
export { Anonymizer } from './anonymize/anonymizer.js';
export type { AnonymizerOptions } from './anonymize/anonymizer.js';
export { Reconciler } from './reconcile/reconciler.js';
export type { AmountCheck, MatchOptions } from './reconcile/reconciler.js';

export {
    MessageEngineError,
    FormatError,
    ParseError,
    UnsupportedFormatError,
    ConfigurationError,
} from './errors/messageErrors.js';
export { getConfig, resetConfig, ConfigGuard } from './bootstrap/config-guard.js';
