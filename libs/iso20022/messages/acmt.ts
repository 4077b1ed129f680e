/**
 * Account management messages (acmt).
 */

import { defineMessage } from '../document/catalog.js';
import { choice, nonEmptyList, optional, record, required } from '../schema/composites.js';
import {
    AccountIdentification4Choice,
    BranchAndFinancialInstitutionIdentification6,
    PartyIdentification135
} from './components.js';
import { ISODateTime, Max35Text } from './dataTypes.js';

// --- acmt.023.001.04 IdentificationVerificationRequestV04 ---

export const Party40Choice = choice('Party40Choice', {
    Pty: optional(PartyIdentification135),
    Agt: optional(BranchAndFinancialInstitutionIdentification6)
});

export const IdentificationAssignment3 = record('IdentificationAssignment3', {
    MsgId: required(Max35Text),
    CreDtTm: required(ISODateTime),
    Cretr: optional(Party40Choice),
    FrstAgt: optional(BranchAndFinancialInstitutionIdentification6),
    Assgnr: required(Party40Choice),
    Assgne: required(Party40Choice)
});

export const IdentificationInformation4 = record('IdentificationInformation4', {
    Pty: optional(PartyIdentification135),
    Acct: optional(AccountIdentification4Choice),
    Agt: optional(BranchAndFinancialInstitutionIdentification6)
});

export const IdentificationVerification4 = record('IdentificationVerification4', {
    Id: required(Max35Text),
    PtyAndAcctId: required(IdentificationInformation4)
});

export const IdentificationVerificationRequestV04 = record('IdentificationVerificationRequestV04', {
    Assgnmt: required(IdentificationAssignment3),
    Vrfctn: nonEmptyList(IdentificationVerification4)
});

export const Acmt02300104 = defineMessage('IdVrfctnReq', 'acmt.023.001.04', IdentificationVerificationRequestV04);
