/**
 * SWIFT logical terminal (LT) addresses: BIC8 + terminal code + branch.
 * `BANKUS33AXXX` is terminal `A` of `BANKUS33XXX`.
 */

const LT_ADDRESS = /^[A-Z0-9]{12}$/;
const BIC = /^([A-Z0-9]{8})([A-Z0-9]{3})?$/;
const PLACEHOLDER = /^X{12}$/;

/** BIC11 for a 12-character LT address; `null` for the all-`X` placeholder. */
export function ltToBic(address: string): string | null {
    const lt = address.trim().toUpperCase();
    if (!LT_ADDRESS.test(lt) || PLACEHOLDER.test(lt)) return null;
    return lt.slice(0, 8) + lt.slice(9);
}

/** LT address with terminal code `A`; BIC8 input gets the `XXX` branch. */
export function bicToLt(bic: string | null): string {
    if (bic === null) return 'X'.repeat(12);
    const match = BIC.exec(bic.trim().toUpperCase());
    if (!match) return 'X'.repeat(12);
    const [, bic8 = '', branch = 'XXX'] = match;
    return `${bic8}A${branch}`;
}
