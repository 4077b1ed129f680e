/**
 * Business message: an optional Business Application Header (AppHdr)
 * travelling with one Document. The header goes through the same
 * decode/encode/validate core as message roots.
 */

import { validateNode, type ValidationResult } from '../validation/propagator.js';
import { decodeElement, type DecodeOptions } from '../wire/decoder.js';
import { encodeElement } from '../wire/encoder.js';
import { HEADER_ELEMENT } from '../wire/xmlAdapter.js';
import type { WireElement } from '../wire/wireElement.js';
import { BusinessApplicationHeaderV02, type BusinessApplicationHeader } from '../messages/head.js';
import type { AnyDocument, DocumentEnvelope } from './envelope.js';

export interface BusinessMessage<D extends AnyDocument> {
    readonly header?: BusinessApplicationHeader;
    readonly document: D;
}

export function decodeHeader(wire: WireElement, options: DecodeOptions = {}): BusinessApplicationHeader {
    return decodeElement(BusinessApplicationHeaderV02, wire, options, HEADER_ELEMENT);
}

export function encodeHeader(header: BusinessApplicationHeader): WireElement {
    return encodeElement(BusinessApplicationHeaderV02, header, HEADER_ELEMENT);
}

/**
 * Header first, then the document; the first violation wins.
 */
export function validateBusinessMessage<D extends AnyDocument>(
    envelope: DocumentEnvelope<D>,
    message: BusinessMessage<D>
): ValidationResult {
    if (message.header) {
        const error = validateNode(BusinessApplicationHeaderV02, message.header, HEADER_ELEMENT, envelope.options);
        if (error) return { success: false, error };
    }
    return envelope.validate(message.document);
}
