import { describe, it } from 'node:test';
import assert from 'node:assert';
import { tokenizeMt } from '../../libs/mt/tokenizer.js';
import { parseParty, readFields, tagMap, toIsoDate, toYymmdd } from '../../libs/mt/fields.js';
import { bicToLt, ltToBic } from '../../libs/mt/address.js';
import { MT_103, UETR } from '../fixtures/messages.js';

describe('tokenizeMt', () => {
    it('splits a complete message into its blocks', () => {
        const { blocks, issues } = tokenizeMt(MT_103);

        assert.deepStrictEqual(issues, []);
        assert.strictEqual(blocks.block1, 'F01BANKUS33AXXX0000000000');
        assert.strictEqual(blocks.block2, 'I103BANKGB22AXXXN');
        assert.strictEqual(blocks.block3?.get('121'), UETR);
        assert.ok(blocks.block4?.startsWith('\n:20:MT-REF-1\n'));
        assert.ok(blocks.block4?.endsWith(':71A:SHA'));
        assert.strictEqual(blocks.block5, null);
    });

    it('reads trailer sub-blocks after block 4', () => {
        const { blocks, issues } = tokenizeMt('{4:\n:20:X\n-}{5:{MAC:00000000}{CHK:123456789ABC}}');

        assert.deepStrictEqual(issues, []);
        assert.strictEqual(blocks.block5?.get('CHK'), '123456789ABC');
        assert.strictEqual(blocks.block5?.get('MAC'), '00000000');
    });

    it('accepts CRLF line endings, a BOM and whitespace between blocks', () => {
        const { blocks, issues } = tokenizeMt('\uFEFF{1:F01BANKUS33AXXX0000000000}\r\n{4:\r\n:20:X\r\n-}\r\n');

        assert.deepStrictEqual(issues, []);
        assert.strictEqual(blocks.block1, 'F01BANKUS33AXXX0000000000');
        assert.strictEqual(blocks.block4, '\r\n:20:X');
    });

    it('only closes block 4 on a line that starts with -}', () => {
        const { issues } = tokenizeMt('{4:\n:20:A-}');
        assert.deepStrictEqual(issues, [{ block: 4, message: 'unterminated block 4', offset: 0 }]);
    });

    it('reports stray text', () => {
        const { issues } = tokenizeMt('hello');
        assert.deepStrictEqual(issues, [{ block: null, message: 'unexpected text at offset 0', offset: 0 }]);
    });

    it('reports unknown block numbers', () => {
        const { issues } = tokenizeMt('{1:F01X}{7:abc}');
        assert.deepStrictEqual(issues, [{ block: null, message: 'unknown block 7', offset: 8 }]);
    });

    it('keeps the first of duplicated blocks', () => {
        const { blocks, issues } = tokenizeMt('{1:A}{1:B}{4:\n:20:X\n-}');

        assert.deepStrictEqual(issues, [{ block: 1, message: 'duplicate block 1', offset: 5 }]);
        assert.strictEqual(blocks.block1, 'A');
    });

    it('reports unterminated header and sub-block blocks', () => {
        assert.strictEqual(tokenizeMt('{1:F01').issues[0]?.message, 'unterminated block 1');
        assert.strictEqual(tokenizeMt('{3:{108:REF}').issues[0]?.message, 'unterminated block 3');
    });
});

describe('readFields', () => {
    it('joins continuation lines and trims trailing blank lines', () => {
        const fields = readFields(':20:A\n:86:LINE1\nLINE2\n\n');
        assert.deepStrictEqual(fields, [
            { tag: '20', value: 'A' },
            { tag: '86', value: 'LINE1\nLINE2' },
        ]);
    });

    it('keeps the first occurrence of a repeated tag in the tag map', () => {
        const tags = tagMap(readFields(':61:FIRST\n:61:SECOND'));
        assert.strictEqual(tags.get('61'), 'FIRST');
    });
});

describe('parseParty', () => {
    it('reads an account line and a free-format name', () => {
        assert.deepStrictEqual(parseParty('/GB29\nALICE\n1 HIGH STREET', 'K'), { account: 'GB29', name: 'ALICE', bic: null });
    });

    it('reads the BIC line of option A', () => {
        assert.deepStrictEqual(parseParty('/123\nNWBKGB2L', 'A'), { account: '123', name: null, bic: 'NWBKGB2L' });
    });

    it('reads the numbered name line of option F', () => {
        assert.deepStrictEqual(parseParty('/ACC\n1/JOHN\n2/STREET', 'F'), { account: 'ACC', name: 'JOHN', bic: null });
    });
});

describe('dates and addresses', () => {
    it('converts YYMMDD and rejects impossible dates', () => {
        assert.strictEqual(toIsoDate('240229'), '2024-02-29');
        assert.strictEqual(toIsoDate('230229'), null);
        assert.strictEqual(toIsoDate('241301'), null);
        assert.strictEqual(toYymmdd('2024-03-01'), '240301');
    });

    it('maps logical terminal addresses to BICs and back', () => {
        assert.strictEqual(ltToBic('BANKUS33AXXX'), 'BANKUS33XXX');
        assert.strictEqual(ltToBic('XXXXXXXXXXXX'), null);
        assert.strictEqual(bicToLt('NWBKGB2L'), 'NWBKGB2LAXXX');
        assert.strictEqual(bicToLt('DEUTDEFF500'), 'DEUTDEFFA500');
        assert.strictEqual(bicToLt(null), 'XXXXXXXXXXXX');
    });
});
