import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from '../errors/messageErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';

/**
 * Immutable element tree with resolved namespace URIs, built from
 * fast-xml-parser's ordered output. Values are never coerced: every text
 * node and attribute stays a string.
 */

export interface XmlElement {
    readonly localName: string;
    readonly prefix: string | null;
    readonly namespace: string | null;
    /** Non-namespace attributes keyed by local name. */
    readonly attributes: ReadonlyMap<string, string>;
    readonly children: readonly XmlElement[];
    /** Trimmed text content, or null when the element carries none. */
    readonly text: string | null;
}

type NamespaceScope = ReadonlyMap<string, string>;

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    removeNSPrefix: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return null;
}

function splitQName(qname: string): { prefix: string | null; localName: string } {
    const colon = qname.indexOf(':');
    return colon === -1
        ? { prefix: null, localName: qname }
        : { prefix: qname.slice(0, colon), localName: qname.slice(colon + 1) };
}

function buildElement(qname: string, body: unknown, rawAttributes: unknown, parentScope: NamespaceScope): XmlElement {
    let scope: Map<string, string> | null = null;
    const attributes = new Map<string, string>();

    if (isRecord(rawAttributes)) {
        for (const [key, value] of Object.entries(rawAttributes)) {
            const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
            const text = scalarText(value) ?? '';
            if (name === 'xmlns' || name.startsWith('xmlns:')) {
                scope ??= new Map(parentScope);
                scope.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), text);
            } else {
                attributes.set(splitQName(name).localName, text);
            }
        }
    }

    const effectiveScope = scope ?? parentScope;
    const { prefix, localName } = splitQName(qname);
    const children: XmlElement[] = [];
    const texts: string[] = [];

    if (Array.isArray(body)) {
        for (const node of body) {
            if (!isRecord(node)) continue;
            for (const [key, value] of Object.entries(node)) {
                if (key === ATTRIBUTES_KEY) continue;
                if (key === TEXT_KEY) {
                    const text = scalarText(value);
                    if (text !== null && text.length > 0) texts.push(text);
                    continue;
                }
                children.push(buildElement(key, value, node[ATTRIBUTES_KEY], effectiveScope));
            }
        }
    }

    return Object.freeze({
        localName,
        prefix,
        namespace: effectiveScope.get(prefix ?? '') ?? null,
        attributes,
        children: Object.freeze(children),
        text: texts.length > 0 ? texts.join('') : null,
    });
}

/**
 * Parses an XML document into its root element. Malformed or truncated
 * input raises ParseError with the validator's line and column.
 */
export function parseXmlDocument(xml: string): XmlElement {
    const verdict = checkWellFormed(xml);
    if (!verdict.ok) {
        throw new ParseError('MX', verdict.message, { line: verdict.line, column: verdict.column });
    }

    let ordered: unknown;
    try {
        ordered = parser.parse(xml);
    } catch (err: unknown) {
        throw ErrorSanitizer.toParseError(err, 'MX', 'xml-tree');
    }

    const roots: XmlElement[] = [];
    if (Array.isArray(ordered)) {
        for (const node of ordered) {
            if (!isRecord(node)) continue;
            for (const [key, value] of Object.entries(node)) {
                if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
                roots.push(buildElement(key, value, node[ATTRIBUTES_KEY], new Map()));
            }
        }
    }

    const [root] = roots;
    if (!root || roots.length > 1) {
        throw new ParseError('MX', `expected exactly one root element, found ${roots.length}`);
    }
    return root;
}

/**
 * Well-formedness check without building a tree.
 */
export function checkWellFormed(xml: string): { ok: true } | { ok: false; message: string; line: number; column: number } {
    const verdict = XMLValidator.validate(xml);
    return verdict === true
        ? { ok: true }
        : { ok: false, message: verdict.err.msg, line: verdict.err.line, column: verdict.err.col };
}

/** Depth-first, document-order walk below `scope` (exclusive). */
export function* descendants(scope: XmlElement, skip?: ReadonlySet<string>): Generator<XmlElement> {
    for (const child of scope.children) {
        yield child;
        if (skip?.has(child.localName)) continue;
        yield* descendants(child, skip);
    }
}
