import { getModuleLogger } from '../logging/logger.js';
import { toCanonicalDecimal } from '../model/decimal.js';
import type { Balance, Entry } from '../model/payment.js';
import { MtField, toIsoDate } from './fields.js';

const logger = getModuleLogger('mt-statement');

/**
 * Customer statement family (MT940, MT942, MT950).
 */

export interface MtStatement {
    readonly accountId: string | null;
    readonly statementId: string | null;
    readonly currency: string | null;
    readonly balances: readonly Balance[];
    readonly entries: readonly Entry[];
}

// value date, entry date (MMDD), mark, funds code, amount, type, references
const FIELD_61 = /^(\d{6})(\d{4})?(RC|RD|EC|ED|C|D)([A-Z])?(\d+,\d*)([NSF][A-Z0-9]{3})(.*)$/;
const BALANCE = /^([CD])(\d{6})([A-Z]{3})(\d+,\d*)$/;
const FLOOR_LIMIT = /^([A-Z]{3})([CD])?(\d+,\d*)$/;

/** Balance tags and their ISO 20022 balance type codes. */
const BALANCE_TYPES: Readonly<Record<string, string>> = {
    '60F': 'OPBD',
    '60M': 'ITBD',
    '62F': 'CLBD',
    '62M': 'ITBD',
    '64': 'CLAV',
    '65': 'FWAV',
};

const CURRENCY_SOURCES = ['60F', '60M', '34F', '62F'] as const;

/** Credit marks: credit, reversal of debit, expected credit. */
function toCreditDebit(mark: string): 'CRDT' | 'DBIT' {
    return mark === 'C' || mark === 'RD' || mark === 'EC' ? 'CRDT' : 'DBIT';
}

function parseBalance(tag: string, value: string): Balance | null {
    const match = BALANCE.exec(value.trim());
    if (!match) {
        logger.warn({ tag }, 'Unparseable statement balance, skipping');
        return null;
    }
    const [, mark = '', date = '', currency = '', rawAmount = ''] = match;
    return {
        type: BALANCE_TYPES[tag] ?? null,
        amount: toCanonicalDecimal(rawAmount, ','),
        currency,
        creditDebit: mark === 'C' ? 'CRDT' : 'DBIT',
        date: toIsoDate(date),
    };
}

function statementCurrency(fields: readonly MtField[]): string | null {
    for (const source of CURRENCY_SOURCES) {
        const field = fields.find(f => f.tag === source);
        if (!field) continue;
        const pattern = source === '34F' ? FLOOR_LIMIT : BALANCE;
        const match = pattern.exec(field.value.trim());
        if (!match) continue;
        const currency = source === '34F' ? match[1] : match[3];
        if (currency) return currency;
    }
    return null;
}

function parseEntry(value: string, currency: string | null, status: string | null): Entry | null {
    const [line = ''] = value.split('\n');
    const match = FIELD_61.exec(line.trim());
    if (!match) {
        logger.warn({ line: line.slice(0, 16) }, 'Unparseable :61: statement line, skipping');
        return null;
    }
    const [, valueDate = '', entryDate, mark = '', , rawAmount = '', , references = ''] = match;
    const [customerRef = '', bankRef = ''] = references.split('//');
    const bookingDate = entryDate === undefined
        ? toIsoDate(valueDate)
        : toIsoDate(`${valueDate.slice(0, 2)}${entryDate}`);

    return {
        reference: customerRef.trim() || bankRef.trim() || null,
        amount: toCanonicalDecimal(rawAmount, ','),
        currency,
        bookingDate,
        status,
        creditDebit: toCreditDebit(mark),
        remittanceInfo: null,
    };
}

/**
 * Reads the statement fields in order; an `:86:` right after a `:61:` becomes
 * that entry's remittance information.
 */
export function parseStatement(fields: readonly MtField[], mtType: string): MtStatement {
    const currency = statementCurrency(fields);
    // Interim reports (942) carry no booking status.
    const status = mtType === '942' ? null : 'BOOK';
    const balances: Balance[] = [];
    const entries: Entry[] = [];
    let accountId: string | null = null;
    let statementId: string | null = null;
    let previous: string | null = null;

    for (const { tag, value } of fields) {
        if (tag === '25' || tag === '25P') {
            accountId ??= value.split('\n')[0]?.trim() || null;
        } else if (tag === '28C' || tag === '28') {
            statementId ??= value.trim() || null;
        } else if (tag in BALANCE_TYPES) {
            const balance = parseBalance(tag, value);
            if (balance) balances.push(balance);
        } else if (tag === '61') {
            const entry = parseEntry(value, currency, status);
            if (!entry) {
                previous = null;
                continue;
            }
            entries.push(entry);
        } else if (tag === '86' && previous === '61') {
            const last = entries.pop();
            if (last) entries.push({ ...last, remittanceInfo: value.trim() || null });
        }
        previous = tag;
    }

    return { accountId, statementId, currency, balances, entries };
}
