/**
 * Cash management messages (camt).
 */

import { defineMessage } from '../document/catalog.js';
import { choice, list, nonEmptyList, optional, record, required } from '../schema/composites.js';
import {
    AccountIdentification4Choice,
    ActiveOrHistoricCurrencyAndAmount,
    BranchAndFinancialInstitutionIdentification6,
    CashAccountType2Choice,
    DateAndDateTime2Choice,
    PartyIdentification135
} from './components.js';
import {
    ActiveOrHistoricCurrencyCode,
    CreditDebitCode,
    DecimalNumber,
    ExternalCode4,
    ISODateTime,
    Max35Text,
    Max500Text,
    Max70Text,
    TrueFalseIndicator
} from './dataTypes.js';

// --- camt.053.001.08 BankToCustomerStatementV08 ---

export const GroupHeader81 = record('GroupHeader81', {
    MsgId: required(Max35Text),
    CreDtTm: required(ISODateTime),
    MsgRcpt: optional(PartyIdentification135),
    AddtlInf: optional(Max500Text)
});

export const DateTimePeriod1 = record('DateTimePeriod1', {
    FrDtTm: required(ISODateTime),
    ToDtTm: required(ISODateTime)
});

export const CashAccount39 = record('CashAccount39', {
    Id: required(AccountIdentification4Choice),
    Tp: optional(CashAccountType2Choice),
    Ccy: optional(ActiveOrHistoricCurrencyCode),
    Nm: optional(Max70Text),
    Ownr: optional(PartyIdentification135),
    Svcr: optional(BranchAndFinancialInstitutionIdentification6)
});

export const BalanceType10Choice = choice('BalanceType10Choice', {
    Cd: optional(ExternalCode4),
    Prtry: optional(Max35Text)
});

export const BalanceType13 = record('BalanceType13', {
    CdOrPrtry: required(BalanceType10Choice)
});

export const CashBalance8 = record('CashBalance8', {
    Tp: required(BalanceType13),
    Amt: required(ActiveOrHistoricCurrencyAndAmount),
    CdtDbtInd: required(CreditDebitCode),
    Dt: required(DateAndDateTime2Choice)
});

export const EntryStatus1Choice = choice('EntryStatus1Choice', {
    Cd: optional(ExternalCode4),
    Prtry: optional(Max35Text)
});

export const ProprietaryBankTransactionCodeStructure1 = record('ProprietaryBankTransactionCodeStructure1', {
    Cd: required(Max35Text),
    Issr: optional(Max35Text)
});

export const BankTransactionCodeStructure4 = record('BankTransactionCodeStructure4', {
    Prtry: optional(ProprietaryBankTransactionCodeStructure1)
});

export const ReportEntry10 = record('ReportEntry10', {
    NtryRef: optional(Max35Text),
    Amt: required(ActiveOrHistoricCurrencyAndAmount),
    CdtDbtInd: required(CreditDebitCode),
    RvslInd: optional(TrueFalseIndicator),
    Sts: required(EntryStatus1Choice),
    BookgDt: optional(DateAndDateTime2Choice),
    ValDt: optional(DateAndDateTime2Choice),
    AcctSvcrRef: optional(Max35Text),
    BkTxCd: required(BankTransactionCodeStructure4),
    AddtlNtryInf: optional(Max500Text)
});

export const AccountStatement9 = record('AccountStatement9', {
    Id: required(Max35Text),
    ElctrncSeqNb: optional(DecimalNumber),
    CreDtTm: optional(ISODateTime),
    FrToDt: optional(DateTimePeriod1),
    Acct: required(CashAccount39),
    Bal: nonEmptyList(CashBalance8),
    Ntry: list(ReportEntry10)
});

export const BankToCustomerStatementV08 = record('BankToCustomerStatementV08', {
    GrpHdr: required(GroupHeader81),
    Stmt: nonEmptyList(AccountStatement9)
});

export const Camt05300108 = defineMessage('BkToCstmrStmt', 'camt.053.001.08', BankToCustomerStatementV08);
