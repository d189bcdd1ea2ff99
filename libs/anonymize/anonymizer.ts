import crypto from 'crypto';
import { getConfig } from '../bootstrap/config-guard.js';
import { MxDocument } from '../iso20022/lookup.js';
import { MxEngine } from '../iso20022/mxEngine.js';
import { checkWellFormed, parseXmlDocument } from '../iso20022/xmlTree.js';
import { getModuleLogger } from '../logging/logger.js';
import { MessageInput, toBuffer } from '../model/bytes.js';
import { createPaymentMessage, PaymentMessage } from '../model/payment.js';
import { TAG_LINE } from '../mt/fields.js';
import { MtEngine } from '../mt/mtEngine.js';
import { ibanCheckDigits, normalizeIban } from '../validation/iban.js';
import { rewriteLeaves, ScanFrame } from './xmlScanner.js';

const logger = getModuleLogger('anonymizer');

export interface AnonymizerOptions {
    /** Alias salt; defaults to DUALWIRE_ANONYMIZER_SALT. */
    readonly salt?: string;
    /** Derive replacement IBAN bodies from the salted hash instead of `crypto.randomInt`. */
    readonly deterministicAccounts?: boolean;
}

const POSTAL_LINES = new Set([
    'StrtNm', 'BldgNb', 'BldgNm', 'Flr', 'PstCd', 'TwnNm', 'TwnLctnNm', 'DstrctNm', 'CtrySubDvsn', 'AdrLine',
]);

const MT_PARTY_TAGS = new Set(['50K', '50A', '50F', '59', '59A', '59F']);
const IBAN_LIKE = /^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/;

/**
 * PII scrubber for test data. Names and identifiers become salted, stable
 * aliases; IBANs are regenerated with valid check digits. Amounts, currencies
 * and message identifiers are never touched.
 */
export class Anonymizer {
    private readonly salt: string;
    private readonly deterministicAccounts: boolean;
    private readonly accounts = new Map<string, string>();

    constructor(options: AnonymizerOptions = {}) {
        this.salt = options.salt ?? getConfig().anonymizerSalt;
        this.deterministicAccounts = options.deterministicAccounts ?? false;
    }

    /** `PREFIX_` + first 8 hex digits of sha256(original + salt), uppercased. */
    alias(original: string, prefix = 'CUST'): string {
        const digest = crypto.createHash('sha256').update(original + this.salt).digest('hex');
        return `${prefix}_${digest.slice(0, 8).toUpperCase()}`;
    }

    private numericBody(seed: string, length: number, attempt: number): string {
        if (!this.deterministicAccounts) {
            return Array.from({ length }, () => String(crypto.randomInt(0, 10))).join('');
        }
        let digits = '';
        for (let block = 0; digits.length < length; block++) {
            const digest = crypto.createHash('sha256').update(`${seed}${this.salt}:${attempt}:${block}`).digest('hex');
            for (const hex of digest) digits += String(parseInt(hex, 16) % 10);
        }
        return digits.slice(0, length);
    }

    /**
     * Same country and length, numeric body, recomputed check digits.
     * Non-IBAN input gets an opaque `ACCT_` alias instead.
     */
    maskIban(raw: string): string {
        const iban = normalizeIban(raw);
        const known = this.accounts.get(iban);
        if (known !== undefined) return known;

        let masked: string;
        if (!IBAN_LIKE.test(iban)) {
            masked = this.alias(iban, 'ACCT');
        } else {
            const country = iban.slice(0, 2);
            const original = iban.slice(4);
            let body = this.numericBody(original, original.length, 0);
            for (let attempt = 1; body === original; attempt++) {
                body = this.numericBody(original, original.length, attempt);
            }
            masked = `${country}${ibanCheckDigits(country, body)}${body}`;
        }

        this.accounts.set(iban, masked);
        return masked;
    }

    private rewriteMxLeaf(namespaces: ReadonlySet<string | null>, path: readonly ScanFrame[], text: string): string | null {
        const leaf = path[path.length - 1];
        if (!leaf || !namespaces.has(leaf.namespace)) return null;
        const names = path.map(frame => frame.localName);
        const parent = names[names.length - 2];
        const grandparent = names[names.length - 3];
        const holder = names[names.length - 4] ?? '';

        if (leaf.localName === 'Nm') return this.alias(text);
        if (POSTAL_LINES.has(leaf.localName) && parent === 'PstlAdr') return 'MASKED';
        if (leaf.localName === 'IBAN') return this.maskIban(text);
        if (leaf.localName === 'Id' && parent === 'Othr') {
            if (grandparent === 'Id' && holder.endsWith('Acct')) return this.alias(text, 'ACCT');
            if (names.includes('PrvtId') || names.includes('OrgId')) return this.alias(text, 'ID');
        }
        return null;
    }

    /**
     * Rewrites PII leaf values inside the message namespace and the business
     * application header's namespace. Malformed XML is returned unchanged.
     */
    anonymizeXml(input: MessageInput): Buffer {
        const raw = toBuffer(input);
        const xml = raw.toString('utf8');
        if (xml.trim() === '') return raw;

        const document = xml.replace(/^\uFEFF/, '');
        const verdict = checkWellFormed(document);
        if (!verdict.ok) {
            logger.warn({ line: verdict.line, column: verdict.column }, 'Malformed XML left unanonymized');
            return raw;
        }

        const doc = MxDocument.open(parseXmlDocument(document));
        const namespaces = new Set([doc.namespace]);
        if (doc.header !== null) namespaces.add(doc.header.namespace);

        let rewritten = 0;
        const result = rewriteLeaves(xml, (path, text) => {
            const replacement = this.rewriteMxLeaf(namespaces, path, text);
            if (replacement !== null) rewritten++;
            return replacement;
        });

        logger.debug({ namespaces: [...namespaces], rewritten }, 'MX document anonymized');
        return Buffer.from(result, 'utf8');
    }

    private rewritePartyLine(line: string, first: boolean, option: string): string {
        if (line.trim() === '') return line;
        if (first && line.startsWith('/')) return `/${this.maskIban(line.slice(1).trim())}`;
        // Option A names an institution by BIC, which is not personal data.
        if (option === 'A') return line;
        const numbered = /^(\d\/)(.*)$/.exec(line);
        if (numbered) return `${numbered[1] ?? ''}${this.alias(numbered[2] ?? '', 'PARTY')}`;
        return this.alias(line.trim(), 'PARTY');
    }

    /**
     * Rewrites ordering and beneficiary customer fields (`:50a:`, `:59a:`):
     * the account line is regenerated, every other line aliased.
     */
    anonymizeMt(input: MessageInput): Buffer {
        const raw = toBuffer(input);
        const text = raw.toString('utf8');
        if (text.trim() === '') return raw;

        let option: string | null = null;
        const lines = text.split('\n').map(rawLine => {
            const carriage = rawLine.endsWith('\r') ? '\r' : '';
            const line = carriage ? rawLine.slice(0, -1) : rawLine;

            if (line.startsWith('-}')) {
                option = null;
                return rawLine;
            }
            const tagLine = TAG_LINE.exec(line);
            if (tagLine) {
                const [, tag = '', value = ''] = tagLine;
                option = MT_PARTY_TAGS.has(tag) ? tag.slice(2) : null;
                return option === null ? rawLine : `:${tag}:${this.rewritePartyLine(value, true, option)}${carriage}`;
            }
            return option === null ? rawLine : `${this.rewritePartyLine(line, false, option)}${carriage}`;
        });

        return Buffer.from(lines.join('\n'), 'utf8');
    }

    /**
     * Anonymized copy of a parsed model. With raw source the bytes are
     * anonymized and re-parsed; otherwise the PII fields are replaced directly.
     */
    anonymizeMessage(message: PaymentMessage): PaymentMessage {
        if (message.rawSource !== null) {
            return message.format === 'MX'
                ? MxEngine.parse(this.anonymizeXml(message.rawSource))
                : MtEngine.parse(this.anonymizeMt(message.rawSource));
        }

        return createPaymentMessage({
            ...message,
            debtorName: message.debtorName === null ? null : this.alias(message.debtorName),
            creditorName: message.creditorName === null ? null : this.alias(message.creditorName),
            debtorAccount: message.debtorAccount === null ? null : this.maskIban(message.debtorAccount),
            creditorAccount: message.creditorAccount === null ? null : this.maskIban(message.creditorAccount),
        });
    }
}
