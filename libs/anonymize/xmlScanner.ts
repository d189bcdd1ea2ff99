/**
 * Raw-text XML scanner for in-place rewriting. Only leaf text content is
 * ever replaced; declarations, comments, attributes, whitespace and
 * formatting outside the rewritten values pass through byte for byte.
 * A rewritten CDATA leaf is written back as escaped text.
 *
 * Expects well-formed input (check with `checkWellFormed` first).
 */

export interface ScanFrame {
    readonly localName: string;
    readonly namespace: string | null;
}

/**
 * Called for every leaf element whose content is text and CDATA only.
 * @param path open elements, outermost first; the last one owns the text
 * @param text entity-decoded, CDATA-unwrapped, trimmed content
 * @returns replacement text, or null to keep the original bytes
 */
export type LeafRewriter = (path: readonly ScanFrame[], text: string) => string | null;

interface OpenElement extends ScanFrame {
    readonly scope: ReadonlyMap<string, string>;
    readonly contentStart: number;
    hasChildren: boolean;
    hasComment: boolean;
}

const ATTRIBUTE = /([^\s=/]+)\s*=\s*("[^"]*"|'[^']*')/g;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
    lt: '<',
    gt: '>',
    amp: '&',
    quot: '"',
    apos: "'",
};

export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (whole, ref: string) => {
        if (ref.startsWith('#x')) return String.fromCodePoint(parseInt(ref.slice(2), 16));
        if (ref.startsWith('#')) return String.fromCodePoint(parseInt(ref.slice(1), 10));
        return NAMED_ENTITIES[ref] ?? whole;
    });
}

const CDATA_SECTION = /(<!\[CDATA\[[\s\S]*?\]\]>)/;

/** Character data of a leaf: entities decoded, CDATA sections taken literally. */
export function leafText(content: string): string {
    return content
        .split(CDATA_SECTION)
        .map(part => (part.startsWith('<![CDATA[') ? part.slice('<![CDATA['.length, -']]>'.length) : decodeEntities(part)))
        .join('');
}

export function escapeText(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** End of a start tag, skipping `>` inside quoted attribute values. */
function tagEnd(xml: string, from: number): number {
    let quote: string | null = null;
    for (let i = from; i < xml.length; i++) {
        const ch = xml.charAt(i);
        if (quote !== null) {
            if (ch === quote) quote = null;
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '>') {
            return i;
        }
    }
    return -1;
}

function skipPast(xml: string, from: number, marker: string): number {
    const at = xml.indexOf(marker, from);
    return at === -1 ? xml.length : at + marker.length;
}

function openElement(tag: string, parentScope: ReadonlyMap<string, string>, contentStart: number): OpenElement {
    const nameEnd = tag.search(/[\s/]|$/);
    const qname = tag.slice(0, nameEnd);
    let scope: Map<string, string> | null = null;

    for (const match of tag.slice(nameEnd).matchAll(ATTRIBUTE)) {
        const [, name = '', quoted = ''] = match;
        if (name !== 'xmlns' && !name.startsWith('xmlns:')) continue;
        scope ??= new Map(parentScope);
        scope.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), decodeEntities(quoted.slice(1, -1)));
    }

    const colon = qname.indexOf(':');
    const prefix = colon === -1 ? '' : qname.slice(0, colon);
    const effective = scope ?? parentScope;
    return {
        localName: colon === -1 ? qname : qname.slice(colon + 1),
        namespace: effective.get(prefix) ?? null,
        scope: effective,
        contentStart,
        hasChildren: false,
        hasComment: false,
    };
}

export function rewriteLeaves(xml: string, rewrite: LeafRewriter): string {
    const stack: OpenElement[] = [];
    const out: string[] = [];
    let copied = 0;
    let pos = 0;

    while (pos < xml.length) {
        const lt = xml.indexOf('<', pos);
        if (lt === -1) break;
        const current = stack[stack.length - 1];

        if (xml.startsWith('<?', lt)) {
            pos = skipPast(xml, lt, '?>');
        } else if (xml.startsWith('<!--', lt)) {
            if (current) current.hasComment = true;
            pos = skipPast(xml, lt, '-->');
        } else if (xml.startsWith('<![CDATA[', lt)) {
            pos = skipPast(xml, lt, ']]>');
        } else if (xml.startsWith('<!', lt)) {
            pos = skipPast(xml, lt, '>');
        } else if (xml.startsWith('</', lt)) {
            const closed = stack.pop();
            if (closed && !closed.hasChildren && !closed.hasComment) {
                const text = leafText(xml.slice(closed.contentStart, lt)).trim();
                const replacement = text.length > 0 ? rewrite([...stack, closed], text) : null;
                if (replacement !== null && replacement !== text) {
                    out.push(xml.slice(copied, closed.contentStart), escapeText(replacement));
                    copied = lt;
                }
            }
            pos = skipPast(xml, lt, '>');
        } else {
            const end = tagEnd(xml, lt + 1);
            if (end === -1) break;
            if (current) current.hasChildren = true;
            const selfClosing = xml.charAt(end - 1) === '/';
            const element = openElement(xml.slice(lt + 1, selfClosing ? end - 1 : end), current?.scope ?? new Map(), end + 1);
            if (!selfClosing) stack.push(element);
            pos = end + 1;
        }
    }

    out.push(xml.slice(copied));
    return out.join('');
}
