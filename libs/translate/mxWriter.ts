import crypto from 'crypto';
import type { PaymentMessage } from '../model/payment.js';
import { account, agent, element, mandatory, money, party, renderDocument, XmlNode } from './xmlNodes.js';

/**
 * MX document writers, one per supported schema version.
 * Null model fields are omitted; schema-mandatory elements without a model
 * counterpart get the fixed placeholders listed in DESIGN.md.
 */

export interface WriteContext {
    readonly now: Date;
    readonly generateUetr: boolean;
}

export interface MxSchema {
    /** `pacs.008.001.08` */
    readonly schema: string;
    readonly family: string;
    readonly messageRoot: string;
    readonly write: (model: PaymentMessage, context: WriteContext) => XmlNode;
}

const NAMESPACE_PREFIX = 'urn:iso:std:iso:20022:tech:xsd:';

function creationTime(model: PaymentMessage, context: WriteContext): string {
    return model.createdAt ?? context.now.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

function uetrFor(model: PaymentMessage, context: WriteContext): string | null {
    return model.uetr ?? (context.generateUetr ? crypto.randomUUID() : null);
}

function pacs008(bicElement: 'BICFI' | 'BIC', withUetr: boolean) {
    return (model: PaymentMessage, context: WriteContext): XmlNode => ({
        GrpHdr: mandatory(
            ['MsgId', model.messageId],
            ['CreDtTm', creationTime(model, context)],
            ['NbOfTxs', '1'],
            ['SttlmInf', { SttlmMtd: 'INDA' }],
            ['InstgAgt', agent(model.senderBic, bicElement)],
            ['InstdAgt', agent(model.receiverBic, bicElement)],
        ),
        CdtTrfTxInf: mandatory(
            ['PmtId', mandatory(
                ['EndToEndId', model.endToEndId ?? 'NOTPROVIDED'],
                ['UETR', withUetr ? uetrFor(model, context) : null],
            )],
            ['IntrBkSttlmAmt', money(model.amount, model.currency)],
            ['IntrBkSttlmDt', model.valueDate],
            ['ChrgBr', model.chargeBearer],
            ['Dbtr', party(model.debtorName)],
            ['DbtrAcct', account(model.debtorAccount)],
            ['DbtrAgt', agent(model.debtorAgentBic, bicElement)],
            ['Cdtr', party(model.creditorName)],
            ['CdtrAcct', account(model.creditorAccount)],
            ['RmtInf', element(['Ustrd', model.remittanceInfo])],
        ),
    });
}

function pain001(bicElement: 'BICFI' | 'BIC', datedExecution: boolean, withUetr: boolean) {
    return (model: PaymentMessage, context: WriteContext): XmlNode => {
        const executionDate = model.valueDate ?? isoDate(context.now);
        return {
            GrpHdr: mandatory(
                ['MsgId', model.messageId],
                ['CreDtTm', creationTime(model, context)],
                ['NbOfTxs', '1'],
                ['CtrlSum', model.amount],
                ['InitgPty', ''],
            ),
            PmtInf: mandatory(
                ['PmtInfId', `${model.messageId}-1`],
                ['PmtMtd', 'TRF'],
                ['ReqdExctnDt', datedExecution ? { Dt: executionDate } : executionDate],
                ['Dbtr', party(model.debtorName)],
                ['DbtrAcct', account(model.debtorAccount)],
                ['DbtrAgt', agent(model.debtorAgentBic, bicElement)],
                ['ChrgBr', model.chargeBearer],
                ['CdtTrfTxInf', mandatory(
                    ['PmtId', mandatory(
                        ['EndToEndId', model.endToEndId ?? 'NOTPROVIDED'],
                        ['UETR', withUetr ? uetrFor(model, context) : null],
                    )],
                    ['Amt', element(['InstdAmt', money(model.amount, model.currency)])],
                    ['Cdtr', party(model.creditorName)],
                    ['CdtrAcct', account(model.creditorAccount)],
                    ['RmtInf', element(['Ustrd', model.remittanceInfo])],
                )],
            ),
        };
    };
}

/** Name of the message a status report answers; a report about a report defaults to pacs.008. */
function originalMessageName(model: PaymentMessage): string {
    return model.messageType === 'unknown' || model.messageType === 'pacs.002' ? 'pacs.008' : model.messageType;
}

function pacs002(model: PaymentMessage, context: WriteContext): XmlNode {
    const reportsOn = originalMessageName(model);
    return {
        GrpHdr: mandatory(
            ['MsgId', model.messageId],
            ['CreDtTm', creationTime(model, context)],
            ['InstgAgt', agent(model.senderBic, 'BICFI')],
            ['InstdAgt', agent(model.receiverBic, 'BICFI')],
        ),
        OrgnlGrpInfAndSts: mandatory(
            ['OrgnlMsgId', model.originalMessageId ?? 'NOTPROVIDED'],
            ['OrgnlMsgNmId', reportsOn],
        ),
        TxInfAndSts: mandatory(
            ['OrgnlEndToEndId', model.endToEndId],
            ['OrgnlUETR', uetrFor(model, context)],
            ['TxSts', model.status],
            ['OrgnlTxRef', element(
                ['IntrBkSttlmAmt', money(model.amount, model.currency)],
                ['IntrBkSttlmDt', model.valueDate],
                ['RmtInf', element(['Ustrd', model.remittanceInfo])],
                ['Dbtr', element(['Pty', element(['Nm', model.debtorName])])],
                ['DbtrAcct', account(model.debtorAccount)],
                ['DbtrAgt', agent(model.debtorAgentBic, 'BICFI')],
                ['Cdtr', element(['Pty', element(['Nm', model.creditorName])])],
                ['CdtrAcct', account(model.creditorAccount)],
            )],
        ),
    };
}

export const MX_SCHEMAS: readonly MxSchema[] = [
    { schema: 'pacs.008.001.08', family: 'pacs.008', messageRoot: 'FIToFICstmrCdtTrf', write: pacs008('BICFI', true) },
    { schema: 'pacs.008.001.02', family: 'pacs.008', messageRoot: 'FIToFICstmrCdtTrf', write: pacs008('BIC', false) },
    { schema: 'pain.001.001.09', family: 'pain.001', messageRoot: 'CstmrCdtTrfInitn', write: pain001('BICFI', true, true) },
    { schema: 'pain.001.001.03', family: 'pain.001', messageRoot: 'CstmrCdtTrfInitn', write: pain001('BIC', false, false) },
    { schema: 'pacs.002.001.10', family: 'pacs.002', messageRoot: 'FIToFIPmtStsRpt', write: pacs002 },
];

/** Full schema name or family; a family selects its first (newest) listed version. */
export function findMxSchema(name: string): MxSchema | null {
    const wanted = name.trim();
    return MX_SCHEMAS.find(s => s.schema === wanted) ?? MX_SCHEMAS.find(s => s.family === wanted) ?? null;
}

export function writeMx(schema: MxSchema, model: PaymentMessage, context: WriteContext): Buffer {
    return renderDocument(`${NAMESPACE_PREFIX}${schema.schema}`, schema.messageRoot, schema.write(model, context));
}
