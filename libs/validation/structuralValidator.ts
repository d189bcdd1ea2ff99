import { detectFormat } from '../detect/formatDetector.js';
import { FormatError, MessageEngineError } from '../errors/messageErrors.js';
import { MxDocument } from '../iso20022/lookup.js';
import { defaultProfileRegistry, MxProfileRegistry } from '../iso20022/profiles.js';
import { checkWellFormed, parseXmlDocument } from '../iso20022/xmlTree.js';
import { getModuleLogger } from '../logging/logger.js';
import { MessageInput, toBuffer } from '../model/bytes.js';
import { parseBlockTwo, readFields, TAG_LINE, tagMap, toIsoDate } from '../mt/fields.js';
import { tokenizeMt } from '../mt/tokenizer.js';
import { ValidationReport, toReport } from './report.js';
import { isUetr } from './uetr.js';

const logger = getModuleLogger('structural-validator');

export interface StructuralOptions {
    readonly registry?: MxProfileRegistry;
    readonly prefixBytes?: number;
}

// ------------------ MT Rules ------------------

const FIELD_LABELS: Readonly<Record<string, string>> = {
    '20': "Sender's Reference",
    '21': 'Related Reference',
    '25': 'Account Identification',
    '32A': 'Value Date/Currency/Interbank Settled Amount',
    '60F': 'Opening Balance',
    '62F': 'Closing Balance',
};

const MANDATORY_TAGS: Readonly<Record<string, readonly string[]>> = {
    '103': ['20', '32A'],
    '202': ['20', '21', '32A'],
    '940': ['20', '25', '60F', '62F'],
    '950': ['20', '25', '60F', '62F'],
    '942': ['20', '25'],
};

const BLOCK1_SHAPE = /^F01(.{12})(\d{10})?$/;
const BLOCK2_SHAPE = /^[IO]\d{3}(.{12})[A-Z0-9]*$/;
const LT_ADDRESS = /^[A-Z]{6}[A-Z0-9]{6}$/;
const SUB_BLOCK_KEY = /^[0-9]{3}$|^[A-Z]{3}$/;

function check32A(value: string): string[] {
    const text = value.trim();
    const errors: string[] = [];
    if (toIsoDate(text.slice(0, 6)) === null) errors.push(`Invalid date in Field 32A: '${text.slice(0, 6)}'`);
    if (!/^[A-Z]{3}$/.test(text.slice(6, 9))) errors.push(`Invalid currency in Field 32A: '${text.slice(6, 9)}'`);
    const amount = text.slice(9);
    if (!/^\d+,\d*$/.test(amount) || amount.length > 15) errors.push(`Invalid amount format in Field 32A: '${amount}'`);
    return errors;
}

function validateMt(text: string): string[] {
    const { blocks, issues } = tokenizeMt(text);
    const errors = issues.map(issue => issue.message);

    if (issues.length === 0) {
        if (blocks.block1 === null) errors.push('Missing Block 1 (Basic Header)');
        if (blocks.block2 === null) errors.push('Missing Block 2 (Application Header)');
        if (blocks.block4 === null) errors.push('Missing Block 4 (Text)');
    }

    if (blocks.block1 !== null) {
        const match = BLOCK1_SHAPE.exec(blocks.block1);
        if (!match) errors.push(`Invalid Block 1 structure: '${blocks.block1}'`);
        else if (!LT_ADDRESS.test(match[1] ?? '')) errors.push(`Invalid BIC format in Block 1: '${match[1] ?? ''}'`);
    }

    if (blocks.block2 !== null) {
        const match = BLOCK2_SHAPE.exec(blocks.block2);
        if (!match) errors.push(`Invalid Block 2 structure: '${blocks.block2}'`);
        else if (!LT_ADDRESS.test(match[1] ?? '')) errors.push(`Invalid BIC format in Block 2: '${match[1] ?? ''}'`);
    }

    for (const [key, value] of blocks.block3 ?? []) {
        if (!SUB_BLOCK_KEY.test(key)) errors.push(`Invalid Block 3 sub-block key: '${key}'`);
        if (key === '121' && !isUetr(value)) errors.push(`Invalid UETR in Block 3 field 121: '${value}'`);
    }

    if (blocks.block4 !== null) {
        if (!/^\r?\n/.test(blocks.block4)) errors.push('Block 4 must open on a new line');
        for (const line of blocks.block4.split(/\r?\n/)) {
            if (line.startsWith(':') && !TAG_LINE.test(line)) errors.push(`Malformed tag line in Block 4: '${line.slice(0, 12)}'`);
        }

        const tags = tagMap(readFields(blocks.block4));
        const mtType = parseBlockTwo(blocks.block2)?.mtType ?? '';
        for (const tag of MANDATORY_TAGS[mtType] ?? ['20']) {
            if (!tags.has(tag)) errors.push(`Mandatory Field :${tag}: (${FIELD_LABELS[tag] ?? tag}) missing`);
        }
        const field32A = tags.get('32A');
        if (field32A !== undefined) errors.push(...check32A(field32A));
    }

    return errors;
}

// ------------------ MX Rules ------------------

function validateMx(text: string, registry: MxProfileRegistry): string[] {
    const verdict = checkWellFormed(text);
    if (!verdict.ok) {
        return [`XML is not well-formed (line ${verdict.line}, column ${verdict.column}): ${verdict.message}`];
    }

    const doc = MxDocument.open(parseXmlDocument(text));
    const resolution = registry.resolve(doc.namespace, doc.messageRoot.localName);
    if (!resolution) return [];

    const { profile } = resolution;
    const errors: string[] = [];
    if (doc.messageRoot.localName !== profile.rootElement) {
        errors.push(`Unexpected message root <${doc.messageRoot.localName}> for ${profile.family}, expected <${profile.rootElement}>`);
        return errors;
    }
    const present = new Set(doc.topLevel().map(c => c.localName));
    for (const required of profile.requiredElements) {
        if (!present.has(required)) errors.push(`Missing required element <${required}> under <${profile.rootElement}> (${profile.family})`);
    }
    return errors;
}

/**
 * Wire-level checks: never throws for content problems.
 */
export class StructuralValidator {
    static validate(input: MessageInput, options: StructuralOptions = {}): ValidationReport {
        const raw = toBuffer(input);
        let errors: string[];
        try {
            const format = detectFormat(raw, options.prefixBytes);
            const text = raw.toString('utf8').replace(/^\uFEFF/, '');
            errors = format === 'MX'
                ? validateMx(text, options.registry ?? defaultProfileRegistry)
                : validateMt(text);
        } catch (err: unknown) {
            if (!(err instanceof MessageEngineError)) throw err;
            errors = [err instanceof FormatError ? `Unknown message format: ${err.message}` : err.message];
        }

        logger.debug({ errors: errors.length }, 'Structural validation finished');
        return toReport(errors);
    }
}
