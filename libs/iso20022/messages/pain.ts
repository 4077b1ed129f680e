/**
 * Payments initiation messages (pain).
 */

import { defineMessage } from '../document/catalog.js';
import { list, nonEmptyList, optional, record, required } from '../schema/composites.js';
import {
    AmountType4Choice,
    BranchAndFinancialInstitutionIdentification6,
    CashAccount38,
    CategoryPurpose1Choice,
    DateAndDateTime2Choice,
    LocalInstrument2Choice,
    PartyIdentification135,
    Purpose2Choice,
    RemittanceInformation16,
    ServiceLevel8Choice
} from './components.js';
import {
    BatchBookingIndicator,
    ChargeBearerType1Code,
    DecimalNumber,
    ISODateTime,
    Max15NumericText,
    Max35Text,
    PaymentMethod3Code,
    Priority2Code,
    UUIDv4Identifier
} from './dataTypes.js';

// --- pain.001.001.09 CustomerCreditTransferInitiationV09 ---

export const GroupHeader85 = record('GroupHeader85', {
    MsgId: required(Max35Text),
    CreDtTm: required(ISODateTime),
    NbOfTxs: required(Max15NumericText),
    CtrlSum: optional(DecimalNumber),
    InitgPty: required(PartyIdentification135)
});

export const PaymentTypeInformation26 = record('PaymentTypeInformation26', {
    InstrPrty: optional(Priority2Code),
    SvcLvl: list(ServiceLevel8Choice),
    LclInstrm: optional(LocalInstrument2Choice),
    CtgyPurp: optional(CategoryPurpose1Choice)
});

export const PaymentIdentification6 = record('PaymentIdentification6', {
    InstrId: optional(Max35Text),
    EndToEndId: required(Max35Text),
    UETR: optional(UUIDv4Identifier)
});

export const CreditTransferTransaction34 = record('CreditTransferTransaction34', {
    PmtId: required(PaymentIdentification6),
    PmtTpInf: optional(PaymentTypeInformation26),
    Amt: required(AmountType4Choice),
    ChrgBr: optional(ChargeBearerType1Code),
    CdtrAgt: optional(BranchAndFinancialInstitutionIdentification6),
    Cdtr: optional(PartyIdentification135),
    CdtrAcct: optional(CashAccount38),
    Purp: optional(Purpose2Choice),
    RmtInf: optional(RemittanceInformation16)
});

export const PaymentInstruction30 = record('PaymentInstruction30', {
    PmtInfId: required(Max35Text),
    PmtMtd: required(PaymentMethod3Code),
    BtchBookg: optional(BatchBookingIndicator),
    NbOfTxs: optional(Max15NumericText),
    CtrlSum: optional(DecimalNumber),
    PmtTpInf: optional(PaymentTypeInformation26),
    ReqdExctnDt: required(DateAndDateTime2Choice),
    Dbtr: required(PartyIdentification135),
    DbtrAcct: required(CashAccount38),
    DbtrAgt: required(BranchAndFinancialInstitutionIdentification6),
    ChrgBr: optional(ChargeBearerType1Code),
    CdtTrfTxInf: nonEmptyList(CreditTransferTransaction34)
});

export const CustomerCreditTransferInitiationV09 = record('CustomerCreditTransferInitiationV09', {
    GrpHdr: required(GroupHeader85),
    PmtInf: nonEmptyList(PaymentInstruction30)
});

export const Pain00100109 = defineMessage('CstmrCdtTrfInitn', 'pain.001.001.09', CustomerCreditTransferInitiationV09);
