import { toCanonicalDecimal } from '../model/decimal.js';

/**
 * Block 4 field grammar and the composite field shapes shared by the MT
 * engine, the structural validator and the anonymizer.
 */

export interface MtField {
    readonly tag: string;
    readonly value: string;
}

export interface BlockTwo {
    readonly direction: 'I' | 'O';
    /** `103` */
    readonly mtType: string;
    readonly receiverAddress: string;
    readonly priority: string | null;
}

export interface ValueDateAmount {
    readonly valueDate: string;
    readonly currency: string;
    readonly amount: string;
}

export interface Party {
    readonly account: string | null;
    readonly name: string | null;
    readonly bic: string | null;
}

export const TAG_LINE = /^:(\d{2}[A-Z]?):(.*)$/;
export const BLOCK1 = /^F01([A-Z0-9]{12})(\d{4}\d{6})?$/;
export const BLOCK2 = /^([IO])(\d{3})([A-Z0-9]{12})([A-Z0-9]*)$/;
const FIELD_32A = /^(\d{2})(\d{2})(\d{2})([A-Z]{3})(\d+,\d*)$/;
const FIELD_32B = /^([A-Z]{3})(\d+,\d*)$/;
const BIC_LINE = /^[A-Z0-9]{8}(?:[A-Z0-9]{3})?$/;

/**
 * Splits a block 4 body into `:TAG:value` fields in order. Lines that do not
 * open a tag continue the previous field, joined with `\n`.
 */
export function readFields(block4: string): MtField[] {
    const fields: { tag: string; lines: string[] }[] = [];
    for (const line of block4.split(/\r?\n/)) {
        const match = TAG_LINE.exec(line);
        if (match) {
            const [, tag = '', value = ''] = match;
            fields.push({ tag, lines: [value] });
            continue;
        }
        const current = fields[fields.length - 1];
        if (current) current.lines.push(line);
    }
    return fields.map(({ tag, lines }) => {
        while (lines.length > 1 && lines[lines.length - 1]?.trim() === '') lines.pop();
        return { tag, value: lines.join('\n') };
    });
}

/** First occurrence of each tag, in field order. */
export function tagMap(fields: readonly MtField[]): ReadonlyMap<string, string> {
    const map = new Map<string, string>();
    for (const field of fields) {
        if (!map.has(field.tag)) map.set(field.tag, field.value);
    }
    return map;
}

export function parseBlockTwo(block2: string | null): BlockTwo | null {
    if (block2 === null) return null;
    const match = BLOCK2.exec(block2.trim());
    if (!match) return null;
    const [, direction = 'I', mtType = '', receiverAddress = '', priority = ''] = match;
    return {
        direction: direction === 'O' ? 'O' : 'I',
        mtType,
        receiverAddress,
        priority: priority === '' ? null : priority,
    };
}

/** `YYMMDD` to `YYYY-MM-DD` (years 2000-2099); null for impossible dates. */
export function toIsoDate(yymmdd: string): string | null {
    const match = /^(\d{2})(\d{2})(\d{2})$/.exec(yymmdd);
    if (!match) return null;
    const [, yy = '', mm = '', dd = ''] = match;
    const iso = `20${yy}-${mm}-${dd}`;
    const date = new Date(`${iso}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(iso) ? iso : null;
}

export function toYymmdd(isoDate: string): string | null {
    const match = /^\d{2}(\d{2})-(\d{2})-(\d{2})/.exec(isoDate);
    if (!match) return null;
    const [, yy = '', mm = '', dd = ''] = match;
    return `${yy}${mm}${dd}`;
}

/** `:32A:` value date, currency and comma-decimal amount; null when any part is invalid. */
export function parseValueDateAmount(value: string): ValueDateAmount | null {
    const match = FIELD_32A.exec(value.trim());
    if (!match) return null;
    const [, yy = '', mm = '', dd = '', currency = '', rawAmount = ''] = match;
    const valueDate = toIsoDate(`${yy}${mm}${dd}`);
    const amount = toCanonicalDecimal(rawAmount, ',');
    if (valueDate === null || amount === null) return null;
    return { valueDate, currency, amount };
}

/** `:32B:`/`:33B:` currency and amount without a date. */
export function parseCurrencyAmount(value: string): { currency: string; amount: string } | null {
    const match = FIELD_32B.exec(value.trim());
    if (!match) return null;
    const [, currency = '', rawAmount = ''] = match;
    const amount = toCanonicalDecimal(rawAmount, ',');
    return amount === null ? null : { currency, amount };
}

/**
 * Party fields (`50K`, `50A`, `50F`, `59`, `59A`, `59F`, `52A`).
 * An optional leading `/account` line, then a BIC (option A), numbered
 * `1/NAME` lines (option F) or a free-format name line (K and no letter).
 */
export function parseParty(value: string, option: string): Party {
    const lines = value.split('\n').map(line => line.trim()).filter(line => line.length > 0);
    let account: string | null = null;

    const [first] = lines;
    if (first?.startsWith('/')) {
        account = first.slice(1).trim() || null;
        lines.shift();
    }

    const [head] = lines;
    if (head === undefined) return { account, name: null, bic: null };
    if (option === 'A') return { account, name: null, bic: BIC_LINE.test(head) ? head : null };

    if (option === 'F') {
        const numberedName = lines.find(line => line.startsWith('1/'));
        return { account, name: numberedName?.slice(2).trim() || null, bic: null };
    }

    return { account, name: head, bic: null };
}
