/**
 * Message components shared across families: amounts, parties, agents,
 * accounts and remittance information. Each is a published subset of the
 * ISO 20022 component of the same name, fields in schema order.
 */

import { choice, list, optional, record, required, simpleContent } from '../schema/composites.js';
import {
    ActiveCurrencyAndAmountSimpleType,
    ActiveCurrencyCode,
    ActiveOrHistoricCurrencyAndAmountSimpleType,
    ActiveOrHistoricCurrencyCode,
    AnyBICDec2014Identifier,
    BICFIDec2014Identifier,
    ClearingChannel2Code,
    CountryCode,
    DocumentType3Code,
    ExternalClearingSystemIdentification1Code,
    ExternalCode4,
    ExternalLocalInstrument1Code,
    IBAN2007Identifier,
    ISODate,
    ISODateTime,
    LEIIdentifier,
    Max140Text,
    Max16Text,
    Max2048Text,
    Max34Text,
    Max35Text,
    Max70Text,
    PhoneNumber,
    Priority2Code
} from './dataTypes.js';

// --- Amounts ---

export const ActiveCurrencyAndAmount = simpleContent(
    'ActiveCurrencyAndAmount',
    { Ccy: required(ActiveCurrencyCode) },
    ActiveCurrencyAndAmountSimpleType
);

export const ActiveOrHistoricCurrencyAndAmount = simpleContent(
    'ActiveOrHistoricCurrencyAndAmount',
    { Ccy: required(ActiveOrHistoricCurrencyCode) },
    ActiveOrHistoricCurrencyAndAmountSimpleType
);

export const EquivalentAmount2 = record('EquivalentAmount2', {
    Amt: required(ActiveOrHistoricCurrencyAndAmount),
    CcyOfTrf: required(ActiveOrHistoricCurrencyCode)
});

export const AmountType4Choice = choice('AmountType4Choice', {
    InstdAmt: optional(ActiveOrHistoricCurrencyAndAmount),
    EqvtAmt: optional(EquivalentAmount2)
});

export const DateAndDateTime2Choice = choice('DateAndDateTime2Choice', {
    Dt: optional(ISODate),
    DtTm: optional(ISODateTime)
});

// --- Parties ---

export const PostalAddress24 = record('PostalAddress24', {
    StrtNm: optional(Max70Text),
    BldgNb: optional(Max16Text),
    PstCd: optional(Max16Text),
    TwnNm: optional(Max35Text),
    Ctry: optional(CountryCode),
    AdrLine: list(Max70Text)
});

// Cd/Prtry pair used by most ISO 20022 *Choice types
const codeOrProprietary = (name: string) =>
    choice(name, {
        Cd: optional(ExternalCode4),
        Prtry: optional(Max35Text)
    });

export const OrganisationIdentificationSchemeName1Choice = codeOrProprietary('OrganisationIdentificationSchemeName1Choice');
export const PersonIdentificationSchemeName1Choice = codeOrProprietary('PersonIdentificationSchemeName1Choice');

export const GenericOrganisationIdentification1 = record('GenericOrganisationIdentification1', {
    Id: required(Max35Text),
    SchmeNm: optional(OrganisationIdentificationSchemeName1Choice),
    Issr: optional(Max35Text)
});

export const OrganisationIdentification29 = record('OrganisationIdentification29', {
    AnyBIC: optional(AnyBICDec2014Identifier),
    LEI: optional(LEIIdentifier),
    Othr: list(GenericOrganisationIdentification1)
});

export const DateAndPlaceOfBirth1 = record('DateAndPlaceOfBirth1', {
    BirthDt: required(ISODate),
    PrvcOfBirth: optional(Max35Text),
    CityOfBirth: required(Max35Text),
    CtryOfBirth: required(CountryCode)
});

export const GenericPersonIdentification1 = record('GenericPersonIdentification1', {
    Id: required(Max35Text),
    SchmeNm: optional(PersonIdentificationSchemeName1Choice),
    Issr: optional(Max35Text)
});

export const PersonIdentification13 = record('PersonIdentification13', {
    DtAndPlcOfBirth: optional(DateAndPlaceOfBirth1),
    Othr: list(GenericPersonIdentification1)
});

export const Party38Choice = choice('Party38Choice', {
    OrgId: optional(OrganisationIdentification29),
    PrvtId: optional(PersonIdentification13)
});

export const Contact4 = record('Contact4', {
    Nm: optional(Max140Text),
    PhneNb: optional(PhoneNumber),
    EmailAdr: optional(Max2048Text)
});

export const PartyIdentification135 = record('PartyIdentification135', {
    Nm: optional(Max140Text),
    PstlAdr: optional(PostalAddress24),
    Id: optional(Party38Choice),
    CtryOfRes: optional(CountryCode),
    CtctDtls: optional(Contact4)
});

// --- Agents ---

export const ClearingSystemIdentification2Choice = choice('ClearingSystemIdentification2Choice', {
    Cd: optional(ExternalClearingSystemIdentification1Code),
    Prtry: optional(Max35Text)
});

export const ClearingSystemMemberIdentification2 = record('ClearingSystemMemberIdentification2', {
    ClrSysId: optional(ClearingSystemIdentification2Choice),
    MmbId: required(Max35Text)
});

export const FinancialInstitutionIdentification18 = record('FinancialInstitutionIdentification18', {
    BICFI: optional(BICFIDec2014Identifier),
    ClrSysMmbId: optional(ClearingSystemMemberIdentification2),
    LEI: optional(LEIIdentifier),
    Nm: optional(Max140Text),
    PstlAdr: optional(PostalAddress24)
});

export const BranchData3 = record('BranchData3', {
    Id: optional(Max35Text),
    LEI: optional(LEIIdentifier),
    Nm: optional(Max140Text),
    PstlAdr: optional(PostalAddress24)
});

export const BranchAndFinancialInstitutionIdentification6 = record('BranchAndFinancialInstitutionIdentification6', {
    FinInstnId: required(FinancialInstitutionIdentification18),
    BrnchId: optional(BranchData3)
});

// --- Accounts ---

export const AccountSchemeName1Choice = codeOrProprietary('AccountSchemeName1Choice');

export const GenericAccountIdentification1 = record('GenericAccountIdentification1', {
    Id: required(Max34Text),
    SchmeNm: optional(AccountSchemeName1Choice),
    Issr: optional(Max35Text)
});

export const AccountIdentification4Choice = choice('AccountIdentification4Choice', {
    IBAN: optional(IBAN2007Identifier),
    Othr: optional(GenericAccountIdentification1)
});

export const CashAccountType2Choice = codeOrProprietary('CashAccountType2Choice');

export const CashAccount38 = record('CashAccount38', {
    Id: required(AccountIdentification4Choice),
    Tp: optional(CashAccountType2Choice),
    Ccy: optional(ActiveOrHistoricCurrencyCode),
    Nm: optional(Max70Text)
});

// --- Payment type ---

export const ServiceLevel8Choice = codeOrProprietary('ServiceLevel8Choice');
export const CategoryPurpose1Choice = codeOrProprietary('CategoryPurpose1Choice');
export const Purpose2Choice = codeOrProprietary('Purpose2Choice');

export const LocalInstrument2Choice = choice('LocalInstrument2Choice', {
    Cd: optional(ExternalLocalInstrument1Code),
    Prtry: optional(Max35Text)
});

export const PaymentTypeInformation28 = record('PaymentTypeInformation28', {
    InstrPrty: optional(Priority2Code),
    ClrChanl: optional(ClearingChannel2Code),
    SvcLvl: list(ServiceLevel8Choice),
    LclInstrm: optional(LocalInstrument2Choice),
    CtgyPurp: optional(CategoryPurpose1Choice)
});

// --- Remittance ---

export const ReferredDocumentInformation7 = record('ReferredDocumentInformation7', {
    Nb: optional(Max35Text),
    RltdDt: optional(ISODate)
});

export const RemittanceAmount2 = record('RemittanceAmount2', {
    DuePyblAmt: optional(ActiveOrHistoricCurrencyAndAmount),
    RmtdAmt: optional(ActiveOrHistoricCurrencyAndAmount)
});

export const CreditorReferenceType1Choice = choice('CreditorReferenceType1Choice', {
    Cd: optional(DocumentType3Code),
    Prtry: optional(Max35Text)
});

export const CreditorReferenceType2 = record('CreditorReferenceType2', {
    CdOrPrtry: required(CreditorReferenceType1Choice),
    Issr: optional(Max35Text)
});

export const CreditorReferenceInformation2 = record('CreditorReferenceInformation2', {
    Tp: optional(CreditorReferenceType2),
    Ref: optional(Max35Text)
});

export const StructuredRemittanceInformation16 = record('StructuredRemittanceInformation16', {
    RfrdDocInf: list(ReferredDocumentInformation7),
    RfrdDocAmt: optional(RemittanceAmount2),
    CdtrRefInf: optional(CreditorReferenceInformation2),
    AddtlRmtInf: list(Max140Text)
});

export const RemittanceInformation16 = record('RemittanceInformation16', {
    Ustrd: list(Max140Text),
    Strd: list(StructuredRemittanceInformation16)
});
