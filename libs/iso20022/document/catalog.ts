/**
 * Message catalog: the construction-time registry of every message root the
 * envelope can dispatch to, indexed by wire tag and by message identifier.
 * Built once and never mutated.
 */

import { CatalogError } from '../../errors/bindingErrors.js';
import type { Infer, RecordType } from '../schema/types.js';

const NAMESPACE_PREFIX = 'urn:iso:std:iso:20022:tech:xsd:';

export interface MessageDefinition<Tag extends string = string, R extends RecordType = RecordType> {
    /** Root element name; the dispatch key. */
    readonly tag: Tag;
    /** Message definition identifier, e.g. `pacs.008.001.08`. */
    readonly identifier: string;
    readonly root: R;
}

/** `{ tag, message }` variant for every definition in the union `E`. */
export type DocumentOf<E> = E extends MessageDefinition<infer Tag, infer R>
    ? { readonly tag: Tag; readonly message: Infer<R> }
    : never;

export function defineMessage<Tag extends string, R extends RecordType>(
    tag: Tag,
    identifier: string,
    root: R
): MessageDefinition<Tag, R> {
    return Object.freeze({ tag, identifier, root });
}

export function namespaceOf(identifier: string): string {
    return `${NAMESPACE_PREFIX}${identifier}`;
}

/**
 * Message identifier named by an ISO 20022 XML namespace, if it is one.
 */
export function identifierOfNamespace(namespace: string): string | undefined {
    return namespace.startsWith(NAMESPACE_PREFIX) ? namespace.slice(NAMESPACE_PREFIX.length) : undefined;
}

export class MessageCatalog<E extends MessageDefinition = MessageDefinition> {
    private readonly byTag: ReadonlyMap<string, E>;
    private readonly byIdentifier: ReadonlyMap<string, E>;

    constructor(definitions: readonly E[]) {
        const byTag = new Map<string, E>();
        const byIdentifier = new Map<string, E>();

        for (const definition of definitions) {
            if (byTag.has(definition.tag)) {
                throw new CatalogError('DuplicateMessageTag', `Message tag ${definition.tag} is registered twice`);
            }
            if (byIdentifier.has(definition.identifier)) {
                throw new CatalogError('DuplicateIdentifier', `Message identifier ${definition.identifier} is registered twice`);
            }
            byTag.set(definition.tag, definition);
            byIdentifier.set(definition.identifier, definition);
        }

        this.byTag = byTag;
        this.byIdentifier = byIdentifier;
    }

    lookup(tag: string): E | undefined {
        return this.byTag.get(tag);
    }

    lookupByIdentifier(identifier: string): E | undefined {
        return this.byIdentifier.get(identifier);
    }

    has(tag: string): boolean {
        return this.byTag.has(tag);
    }

    get tags(): string[] {
        return [...this.byTag.keys()];
    }

    get size(): number {
        return this.byTag.size;
    }

    definitions(): E[] {
        return [...this.byTag.values()];
    }
}
