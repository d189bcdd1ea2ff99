import { countryData } from './countries.js';

/**
 * IBAN grammar and ISO 7064 MOD 97-10 checks.
 */

const IBAN_GRAMMAR = /^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/;
const IBAN_PREFIX = /^[A-Z]{2}\d{2}/;

export function normalizeIban(raw: string): string {
    return raw.replace(/\s+/g, '').toUpperCase();
}

/** Two letters then two digits; anything else is a local account identifier. */
export function isIbanShaped(raw: string): boolean {
    return IBAN_PREFIX.test(normalizeIban(raw));
}

/**
 * Remainder of the alphanumeric string read as a number (A=10 ... Z=35),
 * folded one character at a time so no intermediate exceeds 97 * 100.
 */
export function mod97(alphanumeric: string): number {
    let remainder = 0;
    for (const ch of alphanumeric) {
        const code = ch.charCodeAt(0);
        if (code >= 48 && code <= 57) {
            remainder = (remainder * 10 + (code - 48)) % 97;
        } else if (code >= 65 && code <= 90) {
            remainder = (remainder * 100 + (code - 55)) % 97;
        } else {
            return Number.NaN;
        }
    }
    return remainder;
}

/** Check digits for a country and BBAN: 98 - mod97(BBAN + country + "00"). */
export function ibanCheckDigits(country: string, bban: string): string {
    return String(98 - mod97(`${bban}${country}00`)).padStart(2, '0');
}

/** Null when valid, otherwise the reason. */
export function validateIban(raw: string): string | null {
    const iban = normalizeIban(raw);
    if (!IBAN_GRAMMAR.test(iban)) {
        return `Invalid IBAN structure: '${iban}'`;
    }

    const expectedLength = countryData().ibanLengths.get(iban.slice(0, 2));
    if (expectedLength !== undefined && iban.length !== expectedLength) {
        return `Invalid IBAN length: '${iban}' has ${iban.length} characters, ${iban.slice(0, 2)} requires ${expectedLength}`;
    }

    if (mod97(iban.slice(4) + iban.slice(0, 4)) !== 1) {
        return `Invalid IBAN checksum: '${iban}' fails Modulo-97`;
    }
    return null;
}
