/**
 * Payments remittance advice messages (remt).
 */

import { defineMessage } from '../document/catalog.js';
import { list, nonEmptyList, optional, record, required } from '../schema/composites.js';
import {
    AmountType4Choice,
    DateAndDateTime2Choice,
    PartyIdentification135,
    StructuredRemittanceInformation16
} from './components.js';
import { ISODateTime, Max140Text, Max35Text } from './dataTypes.js';

// --- remt.001.001.06 RemittanceAdviceV06 ---

export const GroupHeader79 = record('GroupHeader79', {
    MsgId: required(Max35Text),
    CreDtTm: required(ISODateTime),
    InitgPty: optional(PartyIdentification135),
    MsgRcpt: optional(PartyIdentification135)
});

export const TransactionReferences6 = record('TransactionReferences6', {
    MsgId: optional(Max35Text),
    PmtInfId: optional(Max35Text),
    InstrId: optional(Max35Text),
    EndToEndId: optional(Max35Text)
});

export const OriginalPaymentInformation8 = record('OriginalPaymentInformation8', {
    Refs: required(TransactionReferences6),
    Amt: optional(AmountType4Choice),
    ReqdExctnDt: optional(DateAndDateTime2Choice),
    Dbtr: optional(PartyIdentification135),
    Cdtr: optional(PartyIdentification135)
});

export const RemittanceInformation22 = record('RemittanceInformation22', {
    RmtId: optional(Max35Text),
    Ustrd: list(Max140Text),
    Strd: list(StructuredRemittanceInformation16),
    OrgnlPmtInf: required(OriginalPaymentInformation8)
});

export const RemittanceAdviceV06 = record('RemittanceAdviceV06', {
    GrpHdr: required(GroupHeader79),
    RmtInf: nonEmptyList(RemittanceInformation22)
});

export const Remt00100106 = defineMessage('RmtAdvc', 'remt.001.001.06', RemittanceAdviceV06);
