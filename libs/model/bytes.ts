/** Raw message input as accepted by every public operation. */
export type MessageInput = Buffer | Uint8Array | string;

export function toBuffer(input: MessageInput): Buffer {
    if (Buffer.isBuffer(input)) return input;
    if (typeof input === 'string') return Buffer.from(input, 'utf8');
    return Buffer.from(input.buffer, input.byteOffset, input.byteLength);
}

export function toText(input: MessageInput): string {
    return typeof input === 'string' ? input : toBuffer(input).toString('utf8');
}
