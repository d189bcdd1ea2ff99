import { FormatError, WireFormat } from '../errors/messageErrors.js';
import { MessageInput, toBuffer } from '../model/bytes.js';

export const DEFAULT_PREFIX_BYTES = 1024;

const BOM = [0xef, 0xbb, 0xbf] as const;
const LT = 0x3c; // <
const LBRACE = 0x7b; // {

function isWhitespace(byte: number): boolean {
    return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

/**
 * Chooses the wire format from a bounded prefix of the input.
 * `<` (XML declaration or opening tag) selects MX, `{1:` selects MT.
 */
export function detectFormat(input: MessageInput, prefixBytes: number = DEFAULT_PREFIX_BYTES): WireFormat {
    const bytes = toBuffer(input);
    const limit = Math.min(bytes.length, prefixBytes);
    let offset = 0;

    if (limit >= 3 && bytes[0] === BOM[0] && bytes[1] === BOM[1] && bytes[2] === BOM[2]) {
        offset = 3;
    }
    while (offset < limit && isWhitespace(bytes[offset] ?? 0)) {
        offset++;
    }

    if (offset < limit && bytes[offset] === LT) {
        return 'MX';
    }
    if (offset + 3 <= limit && bytes[offset] === LBRACE && bytes.toString('latin1', offset + 1, offset + 3) === '1:') {
        return 'MT';
    }

    throw new FormatError(limit);
}
