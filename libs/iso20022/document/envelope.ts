/**
 * Document Envelope
 *
 * Closed tagged union over every registered message root. Dispatches decode,
 * encode and validate to the definition registered for a wire tag. Encoding
 * always re-emits the tag that selected the variant, so
 * `decode(encode(d).tag, encode(d).wire)` reproduces `d`.
 */

import { CatalogError, DecodeError } from '../../errors/bindingErrors.js';
import { validateNode, type ValidateOptions, type ValidationResult } from '../validation/propagator.js';
import { decodeElement, type DecodeOptions } from '../wire/decoder.js';
import { encodeValue } from '../wire/encoder.js';
import { WireElementSchema, type WireElement } from '../wire/wireElement.js';
import type { MessageCatalog, MessageDefinition } from './catalog.js';

/** Shape shared by every document variant. */
export interface AnyDocument {
    readonly tag: string;
    readonly message: unknown;
}

export interface EncodedDocument {
    readonly tag: string;
    readonly wire: WireElement;
}

export type DecodeResult<D> =
    | { readonly success: true; readonly data: D }
    | { readonly success: false; readonly error: DecodeError };

export interface EnvelopeOptions extends DecodeOptions, ValidateOptions {}

/**
 * @typeParam D the document union described by the catalog, e.g. `DocumentOf<typeof definitions[number]>`
 */
export class DocumentEnvelope<D extends AnyDocument> {
    constructor(
        readonly catalog: MessageCatalog,
        readonly options: EnvelopeOptions = {}
    ) {}

    /**
     * Returns a copy of this envelope with some options replaced.
     */
    withOptions(options: EnvelopeOptions): DocumentEnvelope<D> {
        return new DocumentEnvelope<D>(this.catalog, { ...this.options, ...options });
    }

    definitionOf(tag: string): MessageDefinition | undefined {
        return this.catalog.lookup(tag);
    }

    /**
     * @throws DecodeError on an unknown tag, a root that does not match the tag, or malformed content
     */
    decode(tag: string, wire: WireElement): D {
        const definition = this.catalog.lookup(tag);
        if (!definition) {
            throw new DecodeError('UnknownMessageType', `Unknown message type: ${tag}`);
        }
        if (wire.name !== tag) {
            throw new DecodeError('MalformedInput', `Root element ${wire.name} does not match message type ${tag}`, wire.name);
        }

        const message = decodeElement(definition.root, wire, this.options);
        // tag and root come from the same catalog entry
        return { tag: definition.tag, message } as D;
    }

    safeDecode(tag: string, wire: WireElement): DecodeResult<D> {
        try {
            return { success: true, data: this.decode(tag, wire) };
        } catch (error: unknown) {
            if (error instanceof DecodeError) {
                return { success: false, error };
            }
            throw error;
        }
    }

    /**
     * Decodes a wire tree of unknown provenance (e.g. parsed JSON), checking its shape first.
     */
    decodeUnknown(tag: string, input: unknown): D {
        const parsed = WireElementSchema.safeParse(input);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new DecodeError(
                'MalformedInput',
                `Not a wire element tree: ${issue ? issue.message : 'invalid input'}`,
                issue ? issue.path.join('.') : ''
            );
        }
        return this.decode(tag, parsed.data);
    }

    /**
     * @throws CatalogError when the document's tag is not registered
     */
    encode(document: D): EncodedDocument {
        const definition = this.requireDefinition(document.tag);
        return {
            tag: definition.tag,
            wire: encodeValue(definition.root, document.message, definition.tag)
        };
    }

    /**
     * Advisory: a decoded document may well be invalid.
     */
    validate(document: D): ValidationResult {
        const definition = this.requireDefinition(document.tag);
        const error = validateNode(definition.root, document.message, definition.tag, this.options);
        return error ? { success: false, error } : { success: true };
    }

    private requireDefinition(tag: string): MessageDefinition {
        const definition = this.catalog.lookup(tag);
        if (!definition) {
            throw new CatalogError('UnknownMessageType', `Unknown document type: ${tag}`);
        }
        return definition;
    }
}
