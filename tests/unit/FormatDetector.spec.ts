import { describe, it } from 'node:test';
import assert from 'node:assert';
import { detectFormat } from '../../libs/detect/formatDetector.js';
import { FormatError } from '../../libs/errors/messageErrors.js';
import { parse, parseDetailed } from '../../libs/index.js';
import { MT_103, MT_940, PACS_008 } from '../fixtures/messages.js';

describe('detectFormat', () => {
    it('detects an XML declaration as MX', () => {
        assert.strictEqual(detectFormat('<?xml version="1.0"?><Document/>'), 'MX');
    });

    it('skips a BOM and leading whitespace', () => {
        const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('\n  {1:F01BANKUS33AXXX0000000000}')]);
        assert.strictEqual(detectFormat(bytes), 'MT');
    });

    it('accepts Uint8Array input', () => {
        assert.strictEqual(detectFormat(new TextEncoder().encode('<Document/>')), 'MX');
    });

    it('raises FormatError without a signature', () => {
        assert.throws(() => detectFormat('hello'), FormatError);
        assert.throws(() => detectFormat('{2:I103}'), FormatError);
    });

    it('only scans the configured prefix', () => {
        const padded = `${' '.repeat(20)}<Document/>`;
        assert.throws(() => detectFormat(padded, 16), (err: unknown) => {
            assert.ok(err instanceof FormatError);
            assert.strictEqual(err.scannedBytes, 16);
            assert.strictEqual(err.code, 'FORMAT_ERROR');
            return true;
        });
        assert.strictEqual(detectFormat(padded, 64), 'MX');
    });
});

describe('parse facade', () => {
    it('dispatches on the detected format', () => {
        assert.strictEqual(parse(PACS_008).messageType, 'pacs.008');
        assert.strictEqual(parse(MT_103).messageType, 'MT103');
        assert.strictEqual(parseDetailed(MT_940).details.kind, 'statement');
    });

    it('raises FormatError for unrecognized bytes', () => {
        assert.throws(() => parse('plain text'), FormatError);
    });
});
