/**
 * Business Application Header (head.001.001.02).
 */

import { namespaceOf } from '../document/catalog.js';
import { choice, optional, record, required } from '../schema/composites.js';
import type { Infer } from '../schema/types.js';
import { BranchAndFinancialInstitutionIdentification6, PartyIdentification135 } from './components.js';
import { CopyDuplicate1Code, ExternalCode4, ISODateTime, Max35Text, YesNoIndicator } from './dataTypes.js';

export const HEADER_IDENTIFIER = 'head.001.001.02';
export const HEADER_NAMESPACE = namespaceOf(HEADER_IDENTIFIER);

export const Party44Choice = choice('Party44Choice', {
    OrgId: optional(PartyIdentification135),
    FIId: optional(BranchAndFinancialInstitutionIdentification6)
});

export const BusinessApplicationHeaderV02 = record('BusinessApplicationHeaderV02', {
    Fr: required(Party44Choice),
    To: required(Party44Choice),
    BizMsgIdr: required(Max35Text),
    MsgDefIdr: required(Max35Text),
    BizSvc: optional(Max35Text),
    CreDt: required(ISODateTime),
    BizPrcgDt: optional(ISODateTime),
    CpyDplct: optional(CopyDuplicate1Code),
    PssblDplct: optional(YesNoIndicator),
    Prty: optional(ExternalCode4)
});

export type BusinessApplicationHeader = Infer<typeof BusinessApplicationHeaderV02>;
