/**
 * Administration messages (admi).
 */

import { defineMessage } from '../document/catalog.js';
import { list, optional, record, required } from '../schema/composites.js';
import { ISODateTime, Max1000Text, Max20000Text, Max350Text, Max35Text, Max4AlphaNumericText } from './dataTypes.js';

// --- admi.002.001.01 MessageRejectV01 ---

export const MessageReference = record('MessageReference', {
    Ref: required(Max35Text)
});

export const RejectionReason2 = record('RejectionReason2', {
    RjctgPtyRsn: required(Max35Text),
    RjctnDtTm: optional(ISODateTime),
    ErrLctn: optional(Max350Text),
    RsnDesc: optional(Max350Text),
    AddtlData: optional(Max20000Text)
});

export const MessageRejectV01 = record('MessageRejectV01', {
    RltdRef: required(MessageReference),
    Rsn: required(RejectionReason2)
});

// This schema names its root after the message identifier rather than a mnemonic
export const Admi00200101 = defineMessage('admi.002.001.01', 'admi.002.001.01', MessageRejectV01);

// --- admi.004.001.02 SystemEventNotificationV02 ---

export const Event2 = record('Event2', {
    EvtCd: required(Max4AlphaNumericText),
    EvtParam: list(Max35Text),
    EvtDesc: optional(Max1000Text),
    EvtTm: optional(ISODateTime)
});

export const SystemEventNotificationV02 = record('SystemEventNotificationV02', {
    EvtInf: required(Event2)
});

export const Admi00400102 = defineMessage('SysEvtNtfctn', 'admi.004.001.02', SystemEventNotificationV02);
