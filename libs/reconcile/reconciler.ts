import { getModuleLogger } from '../logging/logger.js';
import { compareDecimals, withinPercent } from '../model/decimal.js';
import type { PaymentMessage } from '../model/payment.js';

const logger = getModuleLogger('reconciler');

/**
 * off       identifiers only
 * exact     amounts in the same currency must be numerically equal
 * tolerant  amounts in the same currency may differ by up to 1% (fees)
 *
 * A side without an amount, or a currency mismatch, never fails the check.
 */
export type AmountCheck = 'off' | 'exact' | 'tolerant';

export interface MatchOptions {
    readonly amountCheck?: AmountCheck;
}

const FEE_TOLERANCE_PERCENT = 1;

type LinkKind = 'uetr' | 'end-to-end-id' | 'original-message-id';

function linkKind(a: PaymentMessage, b: PaymentMessage): LinkKind | null {
    if (a.uetr !== null && a.uetr === b.uetr) return 'uetr';
    if (a.endToEndId !== null && a.endToEndId === b.endToEndId) return 'end-to-end-id';
    if (a.originalMessageId !== null && a.originalMessageId === b.messageId) return 'original-message-id';
    if (b.originalMessageId !== null && b.originalMessageId === a.messageId) return 'original-message-id';
    return null;
}

function amountsAgree(a: PaymentMessage, b: PaymentMessage, check: AmountCheck): boolean {
    if (check === 'off' || a.amount === null || b.amount === null || a.currency !== b.currency) return true;
    const agrees = check === 'exact'
        ? compareDecimals(a.amount, b.amount) === 0
        : withinPercent(a.amount, b.amount, FEE_TOLERANCE_PERCENT);
    // Non-canonical amounts fall back to text equality.
    return agrees ?? a.amount === b.amount;
}

function timestamp(message: PaymentMessage): number | null {
    if (message.createdAt === null) return null;
    const time = Date.parse(message.createdAt);
    return Number.isNaN(time) ? null : time;
}

/**
 * Lifecycle correlation across formats (pacs.008 -> MT103 -> pacs.002 -> camt.056 ...).
 */
export class Reconciler {
    /** True when the two messages share an identifier and pass the amount check. */
    static isMatch(a: PaymentMessage, b: PaymentMessage, options: MatchOptions = {}): boolean {
        return linkKind(a, b) !== null && amountsAgree(a, b, options.amountCheck ?? 'off');
    }

    /** Candidates matching `primary`, in candidate order, excluding `primary` itself. */
    static findMatches(primary: PaymentMessage, candidates: readonly PaymentMessage[], options: MatchOptions = {}): PaymentMessage[] {
        return candidates.filter(candidate => candidate !== primary && Reconciler.isMatch(primary, candidate, options));
    }

    /**
     * Every message transitively linked to `seed`, seed included. Members keep
     * their pool order; those with a parseable `createdAt` are then sorted
     * chronologically among themselves. Contradictory stages are all kept.
     */
    static traceLifecycle(seed: PaymentMessage, pool: readonly PaymentMessage[], options: MatchOptions = {}): PaymentMessage[] {
        const linked = new Set<PaymentMessage>([seed]);
        const queue: PaymentMessage[] = [seed];

        for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
            for (const match of Reconciler.findMatches(current, pool, options)) {
                if (linked.has(match)) continue;
                linked.add(match);
                queue.push(match);
            }
        }

        const ordered: PaymentMessage[] = [];
        const placed = new Set<PaymentMessage>();
        if (!pool.includes(seed)) {
            ordered.push(seed);
            placed.add(seed);
        }
        for (const message of pool) {
            if (!linked.has(message) || placed.has(message)) continue;
            ordered.push(message);
            placed.add(message);
        }

        const slots = ordered
            .map((message, index) => ({ message, index, time: timestamp(message) }))
            .filter((slot): slot is { message: PaymentMessage; index: number; time: number } => slot.time !== null);
        const chronological = [...slots].sort((x, y) => x.time - y.time || x.index - y.index);
        slots.forEach((slot, i) => {
            const next = chronological[i];
            if (next) ordered[slot.index] = next.message;
        });

        logger.debug({ seed: seed.messageId, pool: pool.length, linked: ordered.length }, 'Lifecycle traced');
        return ordered;
    }
}
