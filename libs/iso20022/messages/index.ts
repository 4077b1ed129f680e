/**
 * Registered message catalog and the document union it describes.
 */

import { MessageCatalog, type DocumentOf } from '../document/catalog.js';
import { DocumentEnvelope } from '../document/envelope.js';
import { Acmt02300104 } from './acmt.js';
import { Admi00200101, Admi00400102 } from './admi.js';
import { Camt05300108 } from './camt.js';
import { Pacs00200110, Pacs00800108 } from './pacs.js';
import { Pain00100109 } from './pain.js';
import { Remt00100106 } from './remt.js';

export const MESSAGE_DEFINITIONS = [
    Admi00200101,
    Admi00400102,
    Acmt02300104,
    Camt05300108,
    Pacs00200110,
    Pacs00800108,
    Pain00100109,
    Remt00100106
] as const;

export type Iso20022Definition = (typeof MESSAGE_DEFINITIONS)[number];

/** Tagged union over every registered message root. */
export type Iso20022Document = DocumentOf<Iso20022Definition>;

export type MessageTag = Iso20022Document['tag'];

/** Payload type of the variant registered under `T`. */
export type MessageOf<T extends MessageTag> = Extract<Iso20022Document, { readonly tag: T }>['message'];

export const DEFAULT_CATALOG = new MessageCatalog<Iso20022Definition>(MESSAGE_DEFINITIONS);

export function createEnvelope(): DocumentEnvelope<Iso20022Document> {
    return new DocumentEnvelope<Iso20022Document>(DEFAULT_CATALOG);
}

export * from './acmt.js';
export * from './admi.js';
export * from './camt.js';
export * from './components.js';
export * from './dataTypes.js';
export * from './head.js';
export * from './pacs.js';
export * from './pain.js';
export * from './remt.js';
