import { readFileSync } from 'fs';
import { z } from 'zod';

const CountryDataSchema = z.object({
    bicCountries: z.array(z.string().regex(/^[A-Z]{2}$/)),
    ibanLengths: z.record(z.string().regex(/^[A-Z]{2}$/), z.number().int().min(15).max(34)),
});

export interface CountryData {
    readonly bicCountries: ReadonlySet<string>;
    readonly ibanLengths: ReadonlyMap<string, number>;
}

let cached: CountryData | null = null;

/**
 * ISO 3166 alpha-2 codes (plus `XK`) and registered IBAN lengths, read once
 * from `data/countries.json`.
 */
export function countryData(): CountryData {
    if (cached) return cached;
    const raw: unknown = JSON.parse(readFileSync(new URL('./data/countries.json', import.meta.url), 'utf8'));
    const data = CountryDataSchema.parse(raw);
    cached = {
        bicCountries: new Set(data.bicCountries),
        ibanLengths: new Map(Object.entries(data.ibanLengths)),
    };
    return cached;
}
