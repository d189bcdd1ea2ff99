import type { DetailKind } from '../model/payment.js';

/**
 * ISO-20022 structural profiles.
 * One profile per message family: the message root element, the elements
 * it must directly contain, and the repeated element that carries entries.
 */

export interface MxProfile {
    readonly family: string;
    readonly rootElement: string;
    readonly requiredElements: readonly string[];
    readonly entryElement: string | null;
    readonly detailKind: DetailKind;
}

export interface SchemaIdentifier {
    /** `pacs.008` */
    readonly family: string;
    /** `pacs.008.001.08` */
    readonly schema: string;
    readonly version: number;
}

export interface ProfileResolution {
    readonly profile: MxProfile;
    readonly matchedBy: 'namespace' | 'root-element';
}

const ISO_NAMESPACE = /^urn:(?:iso:std:iso:20022:tech:xsd|swift:xsd):([a-z]{4}\.\d{3})\.(\d{3})\.(\d{2})$/;

export function parseSchemaNamespace(namespace: string | null): SchemaIdentifier | null {
    if (namespace === null) return null;
    const match = ISO_NAMESPACE.exec(namespace.trim());
    if (!match) return null;
    const [, family = '', variant = '', version = ''] = match;
    return { family, schema: `${family}.${variant}.${version}`, version: Number(version) };
}

export const DEFAULT_PROFILES: readonly MxProfile[] = [
    { family: 'pacs.008', rootElement: 'FIToFICstmrCdtTrf', requiredElements: ['GrpHdr', 'CdtTrfTxInf'], entryElement: 'CdtTrfTxInf', detailKind: 'payment' },
    { family: 'pacs.009', rootElement: 'FICdtTrf', requiredElements: ['GrpHdr', 'CdtTrfTxInf'], entryElement: 'CdtTrfTxInf', detailKind: 'payment' },
    { family: 'pacs.004', rootElement: 'PmtRtr', requiredElements: ['GrpHdr', 'TxInf'], entryElement: 'TxInf', detailKind: 'payment' },
    { family: 'pacs.002', rootElement: 'FIToFIPmtStsRpt', requiredElements: ['GrpHdr'], entryElement: 'TxInfAndSts', detailKind: 'status' },
    { family: 'pain.001', rootElement: 'CstmrCdtTrfInitn', requiredElements: ['GrpHdr', 'PmtInf'], entryElement: 'CdtTrfTxInf', detailKind: 'payment' },
    { family: 'pain.002', rootElement: 'CstmrPmtStsRpt', requiredElements: ['GrpHdr', 'OrgnlGrpInfAndSts'], entryElement: 'TxInfAndSts', detailKind: 'status' },
    { family: 'camt.052', rootElement: 'BkToCstmrAcctRpt', requiredElements: ['GrpHdr', 'Rpt'], entryElement: 'Ntry', detailKind: 'statement' },
    { family: 'camt.053', rootElement: 'BkToCstmrStmt', requiredElements: ['GrpHdr', 'Stmt'], entryElement: 'Ntry', detailKind: 'statement' },
    { family: 'camt.054', rootElement: 'BkToCstmrDbtCdtNtfctn', requiredElements: ['GrpHdr', 'Ntfctn'], entryElement: 'Ntry', detailKind: 'statement' },
    { family: 'camt.056', rootElement: 'FIToFIPmtCxlReq', requiredElements: ['Assgnmt', 'Undrlyg'], entryElement: 'TxInf', detailKind: 'status' },
    { family: 'camt.029', rootElement: 'RsltnOfInvstgtn', requiredElements: ['Assgnmt', 'Sts'], entryElement: 'CxlDtls', detailKind: 'status' },
];

/**
 * Family lookup. When a document could match more than one profile the exact
 * namespace wins over the message root's local name.
 * Registries are immutable; `extend` returns a new one.
 */
export class MxProfileRegistry {
    private readonly byFamily = new Map<string, MxProfile>();
    private readonly byRootElement = new Map<string, MxProfile>();

    constructor(profiles: readonly MxProfile[] = DEFAULT_PROFILES) {
        // Later profiles replace earlier ones for the same family.
        for (const profile of profiles) {
            const frozen = Object.freeze({ ...profile, requiredElements: Object.freeze([...profile.requiredElements]) });
            const previous = this.byFamily.get(frozen.family);
            if (previous && this.byRootElement.get(previous.rootElement) === previous) {
                this.byRootElement.delete(previous.rootElement);
            }
            this.byFamily.set(frozen.family, frozen);
            this.byRootElement.set(frozen.rootElement, frozen);
        }
    }

    extend(...profiles: MxProfile[]): MxProfileRegistry {
        return new MxProfileRegistry([...this.byFamily.values(), ...profiles]);
    }

    resolve(namespace: string | null, rootElement: string | null): ProfileResolution | null {
        const schema = parseSchemaNamespace(namespace);
        if (schema) {
            const profile = this.byFamily.get(schema.family);
            if (profile) return { profile, matchedBy: 'namespace' };
        }
        if (rootElement !== null) {
            const profile = this.byRootElement.get(rootElement);
            if (profile) return { profile, matchedBy: 'root-element' };
        }
        return null;
    }
}

export const defaultProfileRegistry = new MxProfileRegistry();
