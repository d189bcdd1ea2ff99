/**
 * Single-pass block tokenizer for FIN messages.
 *
 *   {1:...}            flat, first `}` closes
 *   {2:...}            flat
 *   {3:{k:v}{k:v}}     sub-blocks
 *   {4:\n...\n-}       text, closed only by a line starting with `-}`
 *   {5:{k:v}}          sub-blocks
 *
 * Problems are collected as issues; the tokenizer never throws.
 */

export type BlockNumber = 1 | 2 | 3 | 4 | 5;

export interface MtIssue {
    readonly block: BlockNumber | null;
    readonly message: string;
    readonly offset: number;
}

export interface MtBlocks {
    readonly block1: string | null;
    readonly block2: string | null;
    readonly block3: ReadonlyMap<string, string> | null;
    /** Raw block 4 body, without the opening `{4:` and the `-}` terminator. */
    readonly block4: string | null;
    readonly block5: ReadonlyMap<string, string> | null;
}

export interface MtTokenization {
    readonly blocks: MtBlocks;
    readonly issues: readonly MtIssue[];
}

const BLOCK_HEADER = /\{(\d):/y;
const BLOCK4_TERMINATOR = /(?:^|\r?\n)-\}/;

function isBlockNumber(n: number): n is BlockNumber {
    return n >= 1 && n <= 5;
}

function skipWhitespace(text: string, pos: number): number {
    while (pos < text.length && /\s/.test(text.charAt(pos))) pos++;
    return pos;
}

/** Reads `{k:v}` pairs up to the block's closing `}`; returns the next offset or -1. */
function readSubBlocks(text: string, start: number, into: Map<string, string>): number {
    let pos = start;
    while (pos < text.length) {
        const ch = text.charAt(pos);
        if (ch === '}') return pos + 1;
        if (ch !== '{') return -1;

        const colon = text.indexOf(':', pos + 1);
        const close = text.indexOf('}', pos + 1);
        if (colon === -1 || close === -1 || colon > close) return -1;

        const key = text.slice(pos + 1, colon);
        if (!into.has(key)) into.set(key, text.slice(colon + 1, close));
        pos = close + 1;
    }
    return -1;
}

export function tokenizeMt(source: string): MtTokenization {
    const text = source.replace(/^\uFEFF/, '');
    const issues: MtIssue[] = [];
    const seen = new Set<BlockNumber>();
    let block1: string | null = null;
    let block2: string | null = null;
    let block3: Map<string, string> | null = null;
    let block4: string | null = null;
    let block5: Map<string, string> | null = null;

    let pos = skipWhitespace(text, 0);
    while (pos < text.length) {
        BLOCK_HEADER.lastIndex = pos;
        const header = BLOCK_HEADER.exec(text);
        if (!header) {
            issues.push({ block: null, message: `unexpected text at offset ${pos}`, offset: pos });
            break;
        }

        const n = Number(header[1]);
        if (!isBlockNumber(n)) {
            issues.push({ block: null, message: `unknown block ${n}`, offset: pos });
            break;
        }
        const duplicate = seen.has(n);
        if (duplicate) issues.push({ block: n, message: `duplicate block ${n}`, offset: pos });
        seen.add(n);

        const start = pos + header[0].length;
        let next: number;

        if (n === 1 || n === 2) {
            const close = text.indexOf('}', start);
            if (close === -1) {
                issues.push({ block: n, message: `unterminated block ${n}`, offset: pos });
                break;
            }
            if (!duplicate) {
                if (n === 1) block1 = text.slice(start, close);
                else block2 = text.slice(start, close);
            }
            next = close + 1;
        } else if (n === 4) {
            const body = text.slice(start);
            const terminator = BLOCK4_TERMINATOR.exec(body);
            if (!terminator) {
                issues.push({ block: 4, message: 'unterminated block 4', offset: pos });
                break;
            }
            if (!duplicate) block4 = body.slice(0, terminator.index);
            next = start + terminator.index + terminator[0].length;
        } else {
            const pairs = new Map<string, string>();
            next = readSubBlocks(text, start, pairs);
            if (next === -1) {
                issues.push({ block: n, message: `unterminated block ${n}`, offset: pos });
                break;
            }
            if (!duplicate) {
                if (n === 3) block3 = pairs;
                else block5 = pairs;
            }
        }

        pos = skipWhitespace(text, next);
    }

    return { blocks: { block1, block2, block3, block4, block5 }, issues };
}
