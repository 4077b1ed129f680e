/**
 * XML <-> WireElement adapter on @xmldom/xmldom.
 *
 * Reading drops namespace declarations and prefixes, keeps leaf text verbatim
 * and ignores character data between child elements. Writing puts every
 * element of a subtree in the namespace of its top element.
 */

import { DOMImplementation, DOMParser, MIME_TYPE, XMLSerializer } from '@xmldom/xmldom';
import { DecodeError } from '../../errors/bindingErrors.js';
import type { WireElement } from './wireElement.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export const DOCUMENT_ELEMENT = 'Document';
export const HEADER_ELEMENT = 'AppHdr';
export const BUSINESS_MESSAGE_ELEMENT = 'Message';

export interface ParsedXml {
    readonly root: WireElement;
    /** Namespace URI of the root element; empty when it has none. */
    readonly namespace: string;
}

export interface WireDocument {
    /** Name of the message root element, the dispatch tag. */
    readonly tag: string;
    /** Namespace of the `Document` wrapper (or of a bare root); empty when undeclared. */
    readonly namespace: string;
    readonly wire: WireElement;
}

export interface WireBusinessMessage {
    readonly header?: ParsedXml;
    readonly document: WireDocument;
}

export interface WriteXmlOptions {
    /** Prepend `<?xml version="1.0" encoding="UTF-8"?>`. Defaults to true. */
    readonly xmlDeclaration?: boolean;
}

/** A subtree to write together with the namespace it belongs to. */
export interface NamespacedElement {
    readonly namespace: string;
    readonly wire: WireElement;
}

// The parts of the parsed DOM the reader walks
interface XmlNode {
    readonly nodeType: number;
}

interface XmlCharacterData extends XmlNode {
    readonly data: string;
}

interface XmlAttribute {
    readonly name: string;
    readonly prefix: string | null;
    readonly localName: string | null;
    readonly value: string;
}

interface XmlElement extends XmlNode {
    readonly nodeName: string;
    readonly localName: string | null;
    readonly namespaceURI: string | null;
    readonly childNodes: { readonly length: number; item(index: number): XmlNode | null };
    readonly attributes: { readonly length: number; item(index: number): XmlAttribute | null };
}

type XmlDocument = ReturnType<DOMImplementation['createDocument']>;
type XmlOutputElement = ReturnType<XmlDocument['createElementNS']>;

function isElement(node: XmlNode): node is XmlElement {
    return node.nodeType === ELEMENT_NODE;
}

function isCharacterData(node: XmlNode): node is XmlCharacterData {
    return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

function nameOf(element: XmlElement): string {
    return element.localName || element.nodeName;
}

function elementChildren(element: XmlElement): XmlElement[] {
    const children: XmlElement[] = [];
    for (let i = 0; i < element.childNodes.length; i++) {
        const child = element.childNodes.item(i);
        if (child && isElement(child)) children.push(child);
    }
    return children;
}

// Any parser report, warnings included, rejects the input
function parseDom(text: string): XmlElement {
    if (text.trim() === '') {
        throw new DecodeError('MalformedInput', 'Empty XML input');
    }

    const problems: string[] = [];
    const parser = new DOMParser({
        onError: (_level, message) => {
            problems.push(message);
        }
    });

    let documentElement: XmlElement | null;
    try {
        documentElement = parser.parseFromString(text, MIME_TYPE.XML_APPLICATION).documentElement;
    } catch (error: unknown) {
        const [firstProblem] = problems;
        const reason = firstProblem ?? (error instanceof Error ? error.message : String(error));
        throw new DecodeError('MalformedInput', `XML could not be parsed: ${reason}`, '', { cause: error });
    }

    const [firstProblem] = problems;
    if (firstProblem !== undefined) {
        throw new DecodeError('MalformedInput', `XML could not be parsed: ${firstProblem}`);
    }
    if (!documentElement) {
        throw new DecodeError('MalformedInput', 'XML has no root element');
    }
    return documentElement;
}

function toWire(element: XmlElement): WireElement {
    const attributes: Record<string, string> = {};
    for (let i = 0; i < element.attributes.length; i++) {
        const attribute = element.attributes.item(i);
        if (!attribute || attribute.name === 'xmlns' || attribute.prefix === 'xmlns') continue;
        attributes[attribute.localName || attribute.name] = attribute.value;
    }

    const children = elementChildren(element);
    const name = nameOf(element);
    if (children.length > 0) {
        return { name, attributes, children: children.map(toWire) };
    }

    let text: string | undefined;
    for (let i = 0; i < element.childNodes.length; i++) {
        const node = element.childNodes.item(i);
        if (node && isCharacterData(node)) text = (text ?? '') + node.data;
    }
    return text === undefined ? { name, attributes, children: [] } : { name, attributes, text, children: [] };
}

function toParsed(element: XmlElement): ParsedXml {
    return { root: toWire(element), namespace: element.namespaceURI ?? '' };
}

function documentOf(element: XmlElement): WireDocument {
    if (nameOf(element) !== DOCUMENT_ELEMENT) {
        // Bare message root without the Document wrapper
        const { root, namespace } = toParsed(element);
        return { tag: root.name, namespace, wire: root };
    }

    const roots = elementChildren(element);
    const [root] = roots;
    if (root === undefined || roots.length > 1) {
        throw new DecodeError('MalformedInput', `Document must contain exactly one message root, found ${roots.length}`, DOCUMENT_ELEMENT);
    }
    const wire = toWire(root);
    return { tag: wire.name, namespace: element.namespaceURI ?? '', wire };
}

/**
 * @throws DecodeError (MalformedInput) when the text is not well-formed XML
 */
export function parseXml(text: string): ParsedXml {
    return toParsed(parseDom(text));
}

/**
 * Reads `<Document xmlns="…"><Root>…</Root></Document>` or a bare `<Root>`.
 */
export function readDocumentXml(text: string): WireDocument {
    return documentOf(parseDom(text));
}

/**
 * Reads `<Message><AppHdr>…</AppHdr><Document>…</Document></Message>`.
 * A lone `Document` (or bare root) is accepted as a message without header.
 */
export function readBusinessMessageXml(text: string): WireBusinessMessage {
    const root = parseDom(text);
    if (nameOf(root) !== BUSINESS_MESSAGE_ELEMENT) {
        return { document: documentOf(root) };
    }

    const children = elementChildren(root);
    const header = children.find(child => nameOf(child) === HEADER_ELEMENT);
    const document = children.find(child => nameOf(child) === DOCUMENT_ELEMENT);
    if (!document) {
        throw new DecodeError('MalformedInput', 'Business message has no Document', BUSINESS_MESSAGE_ELEMENT);
    }

    return header
        ? { header: toParsed(header), document: documentOf(document) }
        : { document: documentOf(document) };
}

function toElement(doc: XmlDocument, namespace: string, wire: WireElement): XmlOutputElement {
    const element = doc.createElementNS(namespace || null, wire.name);
    for (const [name, value] of Object.entries(wire.attributes)) {
        element.setAttribute(name, value);
    }
    if (wire.children.length > 0) {
        for (const child of wire.children) element.appendChild(toElement(doc, namespace, child));
    } else if (wire.text !== undefined) {
        element.appendChild(doc.createTextNode(wire.text));
    }
    return element;
}

function serialize(doc: XmlDocument, options: WriteXmlOptions): string {
    const body = new XMLSerializer().serializeToString(doc);
    return options.xmlDeclaration === false ? body : `${XML_DECLARATION}\n${body}`;
}

function emptyDocument(): XmlDocument {
    return new DOMImplementation().createDocument(null, '', null);
}

/**
 * Writes `wire` wrapped in `<Document xmlns="namespace">`.
 */
export function writeDocumentXml(wire: WireElement, namespace: string, options: WriteXmlOptions = {}): string {
    const doc = emptyDocument();
    const wrapper = doc.createElementNS(namespace || null, DOCUMENT_ELEMENT);
    wrapper.appendChild(toElement(doc, namespace, wire));
    doc.appendChild(wrapper);
    return serialize(doc, options);
}

/**
 * Writes `<Message>` holding an optional `AppHdr` subtree and a `Document`.
 * @param header the header element itself (named `AppHdr`)
 */
export function writeBusinessMessageXml(
    document: NamespacedElement,
    header: NamespacedElement | undefined,
    options: WriteXmlOptions = {}
): string {
    const doc = emptyDocument();
    const message = doc.createElementNS(null, BUSINESS_MESSAGE_ELEMENT);

    if (header) {
        message.appendChild(toElement(doc, header.namespace, header.wire));
    }
    const wrapper = doc.createElementNS(document.namespace || null, DOCUMENT_ELEMENT);
    wrapper.appendChild(toElement(doc, document.namespace, document.wire));
    message.appendChild(wrapper);
    doc.appendChild(message);

    return serialize(doc, options);
}
