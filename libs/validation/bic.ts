import { countryData } from './countries.js';

const BIC_GRAMMAR = /^[A-Z]{4}([A-Z]{2})[A-Z0-9]{2}(?:[A-Z0-9]{3})?$/;

/** ISO 9362 business identifier code. Null when valid, otherwise the reason. */
export function validateBic(raw: string): string | null {
    const bic = raw.trim();
    const match = BIC_GRAMMAR.exec(bic);
    if (!match) {
        return `Invalid BIC format: '${bic}' must be 8 or 11 characters (4 letters, country, location, optional branch)`;
    }
    const country = match[1] ?? '';
    if (!countryData().bicCountries.has(country)) {
        return `Invalid BIC country code: '${country}' in '${bic}'`;
    }
    return null;
}

const BIC8 = /^[A-Z0-9]{8}$/;

/**
 * Routing BICs are held in 11-character form: an MT header address always
 * carries a branch, so `DEUTDEFF` and `DEUTDEFFXXX` name the same party.
 */
export function toBic11(raw: string): string {
    const bic = raw.trim();
    return BIC8.test(bic) ? `${bic}XXX` : bic;
}
