/**
 * Payments clearing and settlement messages (pacs).
 */

import { defineMessage } from '../document/catalog.js';
import { choice, list, nonEmptyList, optional, record, required } from '../schema/composites.js';
import {
    ActiveCurrencyAndAmount,
    ActiveOrHistoricCurrencyAndAmount,
    BranchAndFinancialInstitutionIdentification6,
    CashAccount38,
    PartyIdentification135,
    PaymentTypeInformation28,
    Purpose2Choice,
    RemittanceInformation16
} from './components.js';
import {
    BaseOneRate,
    BatchBookingIndicator,
    ChargeBearerType1Code,
    DecimalNumber,
    ExternalCode4,
    ISODate,
    ISODateTime,
    Max105Text,
    Max15NumericText,
    Max35Text,
    SettlementMethod1Code,
    UUIDv4Identifier
} from './dataTypes.js';

// --- pacs.008.001.08 FIToFICustomerCreditTransferV08 ---

export const ClearingSystemIdentification3Choice = choice('ClearingSystemIdentification3Choice', {
    Cd: optional(ExternalCode4),
    Prtry: optional(Max35Text)
});

export const SettlementInstruction7 = record('SettlementInstruction7', {
    SttlmMtd: required(SettlementMethod1Code),
    SttlmAcct: optional(CashAccount38),
    ClrSys: optional(ClearingSystemIdentification3Choice)
});

export const GroupHeader93 = record('GroupHeader93', {
    MsgId: required(Max35Text),
    CreDtTm: required(ISODateTime),
    BtchBookg: optional(BatchBookingIndicator),
    NbOfTxs: required(Max15NumericText),
    CtrlSum: optional(DecimalNumber),
    TtlIntrBkSttlmAmt: optional(ActiveCurrencyAndAmount),
    IntrBkSttlmDt: optional(ISODate),
    SttlmInf: required(SettlementInstruction7),
    PmtTpInf: optional(PaymentTypeInformation28),
    InstgAgt: optional(BranchAndFinancialInstitutionIdentification6),
    InstdAgt: optional(BranchAndFinancialInstitutionIdentification6)
});

export const PaymentIdentification7 = record('PaymentIdentification7', {
    InstrId: optional(Max35Text),
    EndToEndId: required(Max35Text),
    TxId: optional(Max35Text),
    UETR: optional(UUIDv4Identifier),
    ClrSysRef: optional(Max35Text)
});

export const Charges7 = record('Charges7', {
    Amt: required(ActiveOrHistoricCurrencyAndAmount),
    Agt: required(BranchAndFinancialInstitutionIdentification6)
});

export const CreditTransferTransaction39 = record('CreditTransferTransaction39', {
    PmtId: required(PaymentIdentification7),
    PmtTpInf: optional(PaymentTypeInformation28),
    IntrBkSttlmAmt: required(ActiveCurrencyAndAmount),
    IntrBkSttlmDt: optional(ISODate),
    InstdAmt: optional(ActiveOrHistoricCurrencyAndAmount),
    XchgRate: optional(BaseOneRate),
    ChrgBr: required(ChargeBearerType1Code),
    ChrgsInf: list(Charges7),
    InstgAgt: optional(BranchAndFinancialInstitutionIdentification6),
    InstdAgt: optional(BranchAndFinancialInstitutionIdentification6),
    UltmtDbtr: optional(PartyIdentification135),
    Dbtr: required(PartyIdentification135),
    DbtrAcct: optional(CashAccount38),
    DbtrAgt: required(BranchAndFinancialInstitutionIdentification6),
    DbtrAgtAcct: optional(CashAccount38),
    CdtrAgt: required(BranchAndFinancialInstitutionIdentification6),
    CdtrAgtAcct: optional(CashAccount38),
    Cdtr: required(PartyIdentification135),
    CdtrAcct: optional(CashAccount38),
    UltmtCdtr: optional(PartyIdentification135),
    Purp: optional(Purpose2Choice),
    RmtInf: optional(RemittanceInformation16)
});

export const FIToFICustomerCreditTransferV08 = record('FIToFICustomerCreditTransferV08', {
    GrpHdr: required(GroupHeader93),
    CdtTrfTxInf: nonEmptyList(CreditTransferTransaction39)
});

export const Pacs00800108 = defineMessage('FIToFICstmrCdtTrf', 'pacs.008.001.08', FIToFICustomerCreditTransferV08);

// --- pacs.002.001.10 FIToFIPaymentStatusReportV10 ---

export const GroupHeader91 = record('GroupHeader91', {
    MsgId: required(Max35Text),
    CreDtTm: required(ISODateTime),
    InstgAgt: optional(BranchAndFinancialInstitutionIdentification6),
    InstdAgt: optional(BranchAndFinancialInstitutionIdentification6)
});

export const StatusReason6Choice = choice('StatusReason6Choice', {
    Cd: optional(ExternalCode4),
    Prtry: optional(Max35Text)
});

export const StatusReasonInformation12 = record('StatusReasonInformation12', {
    Orgtr: optional(PartyIdentification135),
    Rsn: optional(StatusReason6Choice),
    AddtlInf: list(Max105Text)
});

export const OriginalGroupHeader17 = record('OriginalGroupHeader17', {
    OrgnlMsgId: required(Max35Text),
    OrgnlMsgNmId: required(Max35Text),
    OrgnlCreDtTm: optional(ISODateTime),
    GrpSts: optional(ExternalCode4),
    StsRsnInf: list(StatusReasonInformation12)
});

export const PaymentTransaction110 = record('PaymentTransaction110', {
    StsId: optional(Max35Text),
    OrgnlInstrId: optional(Max35Text),
    OrgnlEndToEndId: optional(Max35Text),
    OrgnlTxId: optional(Max35Text),
    TxSts: optional(ExternalCode4),
    StsRsnInf: list(StatusReasonInformation12),
    AccptncDtTm: optional(ISODateTime),
    InstgAgt: optional(BranchAndFinancialInstitutionIdentification6),
    InstdAgt: optional(BranchAndFinancialInstitutionIdentification6)
});

export const FIToFIPaymentStatusReportV10 = record('FIToFIPaymentStatusReportV10', {
    GrpHdr: required(GroupHeader91),
    OrgnlGrpInfAndSts: list(OriginalGroupHeader17),
    TxInfAndSts: list(PaymentTransaction110)
});

export const Pacs00200110 = defineMessage('FIToFIPmtStsRpt', 'pacs.002.001.10', FIToFIPaymentStatusReportV10);
