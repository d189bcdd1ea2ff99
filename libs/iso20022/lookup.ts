import { toCanonicalDecimal } from '../model/decimal.js';
import { getModuleLogger } from '../logging/logger.js';
import { descendants, XmlElement } from './xmlTree.js';

const logger = getModuleLogger('mx-lookup');

/**
 * Local element names from outermost to innermost. The first segment may sit
 * at any depth below the scope; each later segment is a direct child.
 */
export type ElementPath = readonly string[];

export interface AmountValue {
    readonly amount: string | null;
    readonly currency: string | null;
}

const CURRENCY = /^[A-Z]{3}$/;
const NO_AMOUNT: AmountValue = Object.freeze({ amount: null, currency: null });

/**
 * Namespace-scoped, null-safe lookups over a parsed document. The message
 * namespace is fixed at construction; elements from any other namespace
 * (envelope headers, extensions) never match.
 */
export class MxDocument {
    constructor(
        public readonly namespace: string | null,
        /** Element whose children are the message building blocks (GrpHdr, ...). */
        public readonly messageRoot: XmlElement,
        /** Business application header (`AppHdr`), scoped to its own namespace. */
        public readonly header: MxDocument | null = null
    ) {}

    /**
     * The Document element carries the message namespace. Bare documents are
     * their own root; AppHdr/DataPDU envelopes wrap it somewhere below. The
     * message root is the Document's first child; without any Document
     * element the document root stands in.
     */
    static open(root: XmlElement): MxDocument {
        const header = MxDocument.findHeader(root);
        let document: XmlElement | null = root.localName === 'Document' ? root : null;
        if (!document) {
            for (const element of descendants(root)) {
                if (element.localName === 'Document') {
                    document = element;
                    break;
                }
            }
        }
        if (!document) return new MxDocument(root.namespace, root, header);

        const namespace = document.namespace;
        const messageRoot = document.children.find(c => c.namespace === namespace) ?? document;
        return new MxDocument(namespace, messageRoot, header);
    }

    private static findHeader(root: XmlElement): MxDocument | null {
        if (root.localName === 'AppHdr') return new MxDocument(root.namespace, root);
        for (const element of descendants(root, new Set(['Document']))) {
            if (element.localName === 'AppHdr') return new MxDocument(element.namespace, element);
        }
        return null;
    }

    private owns(element: XmlElement): boolean {
        return element.namespace === this.namespace;
    }

    private child(element: XmlElement, localName: string): XmlElement | null {
        return element.children.find(c => c.localName === localName && this.owns(c)) ?? null;
    }

    private descend(start: XmlElement, rest: ElementPath): XmlElement | null {
        let current: XmlElement | null = start;
        for (const segment of rest) {
            if (current === null) return null;
            current = this.child(current, segment);
        }
        return current;
    }

    /** Every element matching `path` in document order. */
    *matches(scope: XmlElement, path: ElementPath, skip?: ReadonlySet<string>): Generator<XmlElement> {
        const [head, ...rest] = path;
        if (head === undefined) return;
        for (const candidate of descendants(scope, skip)) {
            if (candidate.localName !== head || !this.owns(candidate)) continue;
            const found = this.descend(candidate, rest);
            if (found) yield found;
        }
    }

    /** Message building blocks directly under the message root. */
    topLevel(): readonly XmlElement[] {
        return this.messageRoot.children.filter(c => this.owns(c));
    }

    /** First element matching any alternative, in alternative order. */
    element(scope: XmlElement, alternatives: readonly ElementPath[], skip?: ReadonlySet<string>): XmlElement | null {
        for (const path of alternatives) {
            for (const found of this.matches(scope, path, skip)) {
                return found;
            }
        }
        return null;
    }

    /** Text of the first match (per alternative) that carries text. */
    text(scope: XmlElement, alternatives: readonly ElementPath[], skip?: ReadonlySet<string>): string | null {
        for (const path of alternatives) {
            for (const found of this.matches(scope, path, skip)) {
                if (found.text !== null) return found.text;
            }
        }
        return null;
    }

    /**
     * Amount text paired with its `Ccy` attribute. A missing attribute gives
     * a null currency; a non-decimal amount gives neither.
     */
    amount(scope: XmlElement, alternatives: readonly ElementPath[], skip?: ReadonlySet<string>): AmountValue {
        for (const path of alternatives) {
            for (const found of this.matches(scope, path, skip)) {
                if (found.text === null) continue;

                const amount = toCanonicalDecimal(found.text, '.');
                if (amount === null) {
                    logger.warn({ element: found.localName, value: found.text }, 'Unparseable amount text, treating as absent');
                    return NO_AMOUNT;
                }

                const rawCurrency = found.attributes.get('Ccy');
                const currency = rawCurrency === undefined ? null : rawCurrency.trim().toUpperCase();
                if (currency !== null && !CURRENCY.test(currency)) {
                    logger.warn({ element: found.localName, currency: rawCurrency }, 'Malformed Ccy attribute, treating as absent');
                    return { amount, currency: null };
                }
                return { amount, currency };
            }
        }
        return NO_AMOUNT;
    }

    /** Elements named `localName`, without descending into a match. */
    collect(scope: XmlElement, localName: string): XmlElement[] {
        const found: XmlElement[] = [];
        for (const candidate of descendants(scope, new Set([localName]))) {
            if (candidate.localName === localName && this.owns(candidate)) found.push(candidate);
        }
        return found;
    }
}
