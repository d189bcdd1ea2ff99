/**
 * Lossless decimal handling. Amounts stay strings end to end; the only
 * arithmetic (amount comparison) runs on scaled bigints.
 */

const CANONICAL_DECIMAL = /^\d+\.\d+$/;
const LOOSE_DECIMAL = /^(\d+)(?:[.,](\d*))?$/;

export function isCanonicalDecimal(value: string): boolean {
    return CANONICAL_DECIMAL.test(value);
}

/**
 * Normalizes a wire amount ("1000.50", "1000,50", "1000,", "1000") to
 * `digits.digits`. Fraction digits are kept exactly; a missing fraction
 * becomes `.00`. Returns null for anything that is not an unsigned decimal.
 */
export function toCanonicalDecimal(raw: string, separator: '.' | ','): string | null {
    const text = raw.trim();
    const match = LOOSE_DECIMAL.exec(text);
    if (!match) return null;
    // The other separator is never accepted: "1.000,50" is not an MT amount.
    if (text.includes(separator === '.' ? ',' : '.')) return null;

    const integer = match[1] ?? '';
    const fraction = match[2] ?? '';
    return `${integer}.${fraction.length > 0 ? fraction : '00'}`;
}

/** Canonical `1000.50` to MT `1000,50`. */
export function toCommaDecimal(canonical: string): string {
    return canonical.replace('.', ',');
}

interface ScaledDecimal {
    readonly units: bigint;
    readonly scale: number;
}

function toScaled(canonical: string): ScaledDecimal | null {
    if (!CANONICAL_DECIMAL.test(canonical)) return null;
    const [integer = '0', fraction = ''] = canonical.split('.');
    return { units: BigInt(integer + fraction), scale: fraction.length };
}

function align(a: ScaledDecimal, b: ScaledDecimal): [bigint, bigint] {
    const scale = Math.max(a.scale, b.scale);
    return [
        a.units * 10n ** BigInt(scale - a.scale),
        b.units * 10n ** BigInt(scale - b.scale),
    ];
}

/**
 * Compares two canonical decimals numerically ("10.5" equals "10.50").
 * Returns null when either side is not canonical.
 */
export function compareDecimals(a: string, b: string): number | null {
    const left = toScaled(a);
    const right = toScaled(b);
    if (!left || !right) return null;
    const [x, y] = align(left, right);
    return x === y ? 0 : x < y ? -1 : 1;
}

/**
 * True when |a - b| <= max(a, b) * percent / 100.
 */
export function withinPercent(a: string, b: string, percent: number): boolean | null {
    const left = toScaled(a);
    const right = toScaled(b);
    if (!left || !right) return null;
    const [x, y] = align(left, right);
    const diff = x > y ? x - y : y - x;
    const larger = x > y ? x : y;
    // Scale by 100 so integer percentages stay exact.
    return diff * 100n <= larger * BigInt(Math.round(percent));
}
