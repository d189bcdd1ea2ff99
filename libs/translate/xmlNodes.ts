import { XMLBuilder } from 'fast-xml-parser';
import { getModuleLogger } from '../logging/logger.js';

const logger = getModuleLogger('mx-writer');

/**
 * Object tree in the shape XMLBuilder serializes: keys in insertion order,
 * `@_` attributes, `#text` for text beside attributes.
 */
export type XmlValue = string | XmlNode | XmlValue[];
export interface XmlNode {
    [name: string]: XmlValue;
}

const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
});

const IBAN_SHAPE = /^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/;

/** Element with its null children dropped; `null` when nothing is left. */
export function element(...children: [string, XmlValue | null][]): XmlNode | null {
    const node: XmlNode = {};
    for (const [name, value] of children) {
        if (value !== null) node[name] = value;
    }
    return Object.keys(node).length > 0 ? node : null;
}

/** Like `element`, but kept as an empty node (`<Dbtr/>`) when mandatory. */
export function mandatory(...children: [string, XmlValue | null][]): XmlNode | string {
    return element(...children) ?? '';
}

/** Amounts need a `Ccy`; one without a currency is left out of the document. */
export function money(amount: string | null, currency: string | null): XmlNode | null {
    if (amount === null) return null;
    if (currency === null) {
        logger.warn({ amount }, 'Amount without currency omitted from MX output');
        return null;
    }
    return { '@_Ccy': currency, '#text': amount };
}

export function agent(bic: string | null, bicElement: 'BICFI' | 'BIC'): XmlNode | null {
    return bic === null ? null : { FinInstnId: { [bicElement]: bic } };
}

export function account(id: string | null): XmlNode | null {
    if (id === null) return null;
    return IBAN_SHAPE.test(id) ? { Id: { IBAN: id } } : { Id: { Othr: { Id: id } } };
}

export function party(name: string | null): XmlNode | string {
    return mandatory(['Nm', name]);
}

export function renderDocument(namespace: string, messageRoot: string, body: XmlNode): Buffer {
    const xml = builder.build({ Document: { '@_xmlns': namespace, [messageRoot]: body } });
    return Buffer.from(`<?xml version="1.0" encoding="UTF-8"?>\n${xml}`, 'utf8');
}
