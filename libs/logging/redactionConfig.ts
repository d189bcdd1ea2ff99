/**
 * Centralized Redaction Configuration
 * Keys whose values must never reach a log line: party names, account
 * identifiers and raw message payloads.
 */
export const REDACT_KEYS = [
    // Parties (Root and Nested)
    'debtorName', '*.debtorName',
    'creditorName', '*.creditorName',
    'debtor_name', '*.debtor_name',
    'creditor_name', '*.creditor_name',
    'name', '*.name',

    // Accounts (Root and Nested)
    'debtorAccount', '*.debtorAccount',
    'creditorAccount', '*.creditorAccount',
    'debtor_account', '*.debtor_account',
    'creditor_account', '*.creditor_account',
    'iban', '*.iban',
    'account', '*.account',

    // Payloads
    'rawSource', '*.rawSource',
    'payload', '*.payload',

    // Secrets
    'salt', '*.salt',
    'anonymizerSalt', '*.anonymizerSalt'
];

export const REDACT_CENSOR = '[REDACTED]';
