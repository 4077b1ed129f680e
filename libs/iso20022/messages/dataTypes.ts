/**
 * ISO 20022 data types shared by the message catalog.
 * Names and facets follow the published XSDs.
 */

import { code, decimal, indicator, text } from '../schema/leaves.js';

// --- Text ---

export const Max4Text = text('Max4Text', { minLength: 1, maxLength: 4 });
export const Max16Text = text('Max16Text', { minLength: 1, maxLength: 16 });
export const Max34Text = text('Max34Text', { minLength: 1, maxLength: 34 });
export const Max35Text = text('Max35Text', { minLength: 1, maxLength: 35 });
export const Max70Text = text('Max70Text', { minLength: 1, maxLength: 70 });
export const Max105Text = text('Max105Text', { minLength: 1, maxLength: 105 });
export const Max140Text = text('Max140Text', { minLength: 1, maxLength: 140 });
export const Max350Text = text('Max350Text', { minLength: 1, maxLength: 350 });
export const Max500Text = text('Max500Text', { minLength: 1, maxLength: 500 });
export const Max1000Text = text('Max1000Text', { minLength: 1, maxLength: 1000 });
export const Max2048Text = text('Max2048Text', { minLength: 1, maxLength: 2048 });
export const Max20000Text = text('Max20000Text', { minLength: 1, maxLength: 20000 });

export const Max4AlphaNumericText = text('Max4AlphaNumericText', {
    minLength: 1,
    maxLength: 4,
    pattern: '[a-zA-Z0-9]{1,4}'
});
export const Max15NumericText = text('Max15NumericText', { pattern: '[0-9]{1,15}' });
export const PhoneNumber = text('PhoneNumber', { pattern: '\\+[0-9]{1,3}-[0-9()+\\-]{1,30}' });

// External code sets are published outside the schema; only their length is checked
export const ExternalCode4 = text('ExternalCode4', { minLength: 1, maxLength: 4 });
export const ExternalClearingSystemIdentification1Code = text('ExternalClearingSystemIdentification1Code', {
    minLength: 1,
    maxLength: 5
});
export const ExternalLocalInstrument1Code = text('ExternalLocalInstrument1Code', { minLength: 1, maxLength: 35 });

// --- Identifiers ---

export const BICFIDec2014Identifier = text('BICFIDec2014Identifier', {
    pattern: '[A-Z0-9]{4,4}[A-Z]{2,2}[A-Z0-9]{2,2}([A-Z0-9]{3,3}){0,1}'
});
export const AnyBICDec2014Identifier = text('AnyBICDec2014Identifier', {
    pattern: '[A-Z0-9]{4,4}[A-Z]{2,2}[A-Z0-9]{2,2}([A-Z0-9]{3,3}){0,1}'
});
export const LEIIdentifier = text('LEIIdentifier', { pattern: '[A-Z0-9]{18,18}[0-9]{2,2}' });
export const IBAN2007Identifier = text('IBAN2007Identifier', { pattern: '[A-Z]{2,2}[0-9]{2,2}[a-zA-Z0-9]{1,30}' });
export const UUIDv4Identifier = text('UUIDv4Identifier', {
    pattern: '[a-f0-9]{8}-[a-f0-9]{4}-4[a-f0-9]{3}-[89ab][a-f0-9]{3}-[a-f0-9]{12}'
});
export const CountryCode = text('CountryCode', { pattern: '[A-Z]{2,2}' });
export const ActiveCurrencyCode = text('ActiveCurrencyCode', { pattern: '[A-Z]{3,3}' });
export const ActiveOrHistoricCurrencyCode = text('ActiveOrHistoricCurrencyCode', { pattern: '[A-Z]{3,3}' });

// --- Dates ---

export const ISODate = text('ISODate', { pattern: '\\d{4}-\\d{2}-\\d{2}' });
export const ISODateTime = text('ISODateTime', {
    pattern: '\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?(Z|[+-]\\d{2}:\\d{2})?'
});

// --- Numbers and indicators ---

export const ActiveCurrencyAndAmountSimpleType = decimal('ActiveCurrencyAndAmount_SimpleType', { minInclusive: 0 });
export const ActiveOrHistoricCurrencyAndAmountSimpleType = decimal('ActiveOrHistoricCurrencyAndAmount_SimpleType', {
    minInclusive: 0
});
export const DecimalNumber = decimal('DecimalNumber');
export const BaseOneRate = decimal('BaseOneRate');

export const BatchBookingIndicator = indicator('BatchBookingIndicator');
export const TrueFalseIndicator = indicator('TrueFalseIndicator');
export const YesNoIndicator = indicator('YesNoIndicator');

// --- Code lists ---

export const SettlementMethod1Code = code('SettlementMethod1Code', ['INDA', 'INGA', 'COVE', 'CLRG']);
export const ChargeBearerType1Code = code('ChargeBearerType1Code', ['DEBT', 'CRED', 'SHAR', 'SLEV']);
export const CreditDebitCode = code('CreditDebitCode', ['CRDT', 'DBIT']);
export const Priority2Code = code('Priority2Code', ['HIGH', 'NORM']);
export const ClearingChannel2Code = code('ClearingChannel2Code', ['RTGS', 'RTNS', 'MPNS', 'BOOK']);
export const PaymentMethod3Code = code('PaymentMethod3Code', ['CHK', 'TRF', 'TRA']);
export const CopyDuplicate1Code = code('CopyDuplicate1Code', ['CODU', 'COPY', 'DUPL']);
export const DocumentType3Code = code('DocumentType3Code', ['RADM', 'RPIN', 'FXDR', 'DISP', 'PUOR', 'SCOR']);
