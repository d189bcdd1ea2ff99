import type { ElementPath } from './lookup.js';
import type { TextField } from '../model/payment.js';

/**
 * Local element name table for canonical field extraction.
 * Alternatives are tried in order; version differences (`BICFI` from .08,
 * `BIC` in .02) and family differences (`Assgnmt/Id` for investigations)
 * live here rather than in code.
 */

type MappedField = Exclude<TextField, 'messageType' | 'amount' | 'currency' | 'chargeBearer'>;

const bic = (...agent: string[]): ElementPath[] => [
    [...agent, 'FinInstnId', 'BICFI'],
    [...agent, 'FinInstnId', 'BIC'],
];

export const MX_FIELD_MAP: Readonly<Record<MappedField, readonly ElementPath[]>> = {
    messageId: [['GrpHdr', 'MsgId'], ['Assgnmt', 'Id'], ['MsgId']],
    endToEndId: [['PmtId', 'EndToEndId'], ['EndToEndId'], ['OrgnlEndToEndId']],
    senderBic: [...bic('InstgAgt'), ...bic('Assgnr', 'Agt')],
    receiverBic: [...bic('InstdAgt'), ...bic('Assgne', 'Agt')],
    debtorAgentBic: bic('DbtrAgt'),
    debtorName: [['Dbtr', 'Nm'], ['Dbtr', 'Pty', 'Nm']],
    debtorAccount: [['DbtrAcct', 'Id', 'IBAN'], ['DbtrAcct', 'Id', 'Othr', 'Id']],
    creditorName: [['Cdtr', 'Nm'], ['Cdtr', 'Pty', 'Nm']],
    creditorAccount: [['CdtrAcct', 'Id', 'IBAN'], ['CdtrAcct', 'Id', 'Othr', 'Id']],
    uetr: [['PmtId', 'UETR'], ['UETR'], ['OrgnlUETR']],
    createdAt: [['GrpHdr', 'CreDtTm'], ['Assgnmt', 'CreDtTm'], ['CreDtTm']],
    valueDate: [['IntrBkSttlmDt'], ['ReqdExctnDt', 'Dt'], ['ReqdExctnDt']],
    messageSubtype: [['PmtTpInf', 'CtgyPurp', 'Cd'], ['PmtTpInf', 'LclInstrm', 'Prtry']],
    remittanceInfo: [['RmtInf', 'Ustrd']],
    originalMessageId: [['OrgnlGrpInf', 'OrgnlMsgId'], ['OrgnlGrpInfAndSts', 'OrgnlMsgId'], ['OrgnlMsgId']],
    status: [['TxSts'], ['GrpSts'], ['Sts', 'Conf']],
};

/** Business application header fallbacks, read when the Document has no value. */
export const MX_HEADER_FIELD_MAP: Readonly<Record<'messageId' | 'senderBic' | 'receiverBic' | 'createdAt', readonly ElementPath[]>> = {
    messageId: [['BizMsgIdr']],
    senderBic: bic('Fr', 'FIId'),
    receiverBic: bic('To', 'FIId'),
    createdAt: [['CreDt']],
};

export const MX_AMOUNT_PATHS: readonly ElementPath[] = [
    ['IntrBkSttlmAmt'],
    ['InstdAmt'],
    ['RtrdIntrBkSttlmAmt'],
    ['OrgnlIntrBkSttlmAmt'],
    ['TtlIntrBkSttlmAmt'],
];

export const MX_CHARGE_BEARER_PATHS: readonly ElementPath[] = [['ChrgBr']];

/** Per-entry lookups, scoped to one entry element. */
export const MX_ENTRY_FIELD_MAP = {
    reference: [['NtryRef'], ['AcctSvcrRef'], ['PmtId', 'EndToEndId'], ['EndToEndId'], ['OrgnlEndToEndId'], ['CxlId']],
    amount: [['Amt'], ['IntrBkSttlmAmt'], ['InstdAmt'], ['RtrdIntrBkSttlmAmt'], ['OrgnlIntrBkSttlmAmt']],
    bookingDate: [['BookgDt', 'Dt'], ['BookgDt', 'DtTm'], ['IntrBkSttlmDt'], ['ReqdExctnDt', 'Dt'], ['AccptncDtTm']],
    // v02+ statements wrap the status code in Sts/Cd; older ones carry text in Sts.
    status: [['Sts', 'Cd'], ['Sts'], ['TxSts'], ['TxCxlSts']],
    creditDebit: [['CdtDbtInd']],
    remittanceInfo: [['RmtInf', 'Ustrd'], ['AddtlNtryInf']],
} as const satisfies Record<string, readonly ElementPath[]>;

export const MX_DETAIL_FIELD_MAP = {
    settlementMethod: [['SttlmInf', 'SttlmMtd']],
    numberOfTransactions: [['GrpHdr', 'NbOfTxs']],
    controlSum: [['GrpHdr', 'CtrlSum']],
    statementId: [['Stmt', 'Id'], ['Rpt', 'Id'], ['Ntfctn', 'Id']],
    accountId: [['Acct', 'Id', 'IBAN'], ['Acct', 'Id', 'Othr', 'Id']],
    accountCurrency: [['Acct', 'Ccy']],
    originalMessageType: [['OrgnlMsgNmId']],
    groupStatus: [['GrpSts'], ['Sts', 'Conf']],
    balanceType: [['Tp', 'CdOrPrtry', 'Cd'], ['Tp', 'CdOrPrtry', 'Prtry']],
    balanceDate: [['Dt', 'Dt'], ['Dt', 'DtTm']],
} as const satisfies Record<string, readonly ElementPath[]>;
