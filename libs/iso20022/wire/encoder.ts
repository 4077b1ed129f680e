/**
 * Record -> wire encoding.
 *
 * Children are emitted in field declaration order. Absent optional fields and
 * empty optional lists produce no element at all.
 */

import { EncodeError } from '../../errors/bindingErrors.js';
import type { FieldMap, Infer, LeafType, SimpleContentType, TypeNode } from '../schema/types.js';
import type { WireElement } from './wireElement.js';

type RecordValue = Readonly<Record<string, unknown>>;

function isRecordValue(value: unknown): value is RecordValue {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encodes a value as an element named `name`.
 */
export function encodeElement<N extends TypeNode>(node: N, value: Infer<N>, name: string): WireElement {
    return encodeNode(node, value, name, name);
}

/**
 * Encodes a value whose type is only known at run time; a value of the wrong
 * shape is an `EncodeError` (TypeMismatch).
 */
export function encodeValue(node: TypeNode, value: unknown, name: string): WireElement {
    return encodeNode(node, value, name, name);
}

function encodeNode(node: TypeNode, value: unknown, name: string, path: string): WireElement {
    switch (node.kind) {
        case 'leaf':
            return { name, attributes: {}, text: encodeLeaf(node, value, path), children: [] };
        case 'record':
            return { name, attributes: {}, children: encodeFields(node.fields, requireRecord(value, node.name, path), path) };
        case 'choice':
            return { name, attributes: {}, children: encodeFields(node.alternatives, requireRecord(value, node.name, path), path) };
        case 'simple':
            return encodeSimpleContent(node, requireRecord(value, node.name, path), name, path);
    }
}

function requireRecord(value: unknown, typeName: string, path: string): RecordValue {
    if (!isRecordValue(value)) {
        throw new EncodeError('TypeMismatch', `Expected a record of type ${typeName}`, path);
    }
    return value;
}

function encodeLeaf(leaf: LeafType, value: unknown, path: string): string {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
        throw new EncodeError('TypeMismatch', `Expected a scalar value of type ${leaf.name}`, path);
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new EncodeError('TypeMismatch', `Expected a finite number of type ${leaf.name}`, path);
    }
    return leaf.format(value);
}

function encodeFields(fields: FieldMap, value: RecordValue, path: string): WireElement[] {
    const children: WireElement[] = [];

    for (const [tag, spec] of Object.entries(fields)) {
        const fieldValue = value[tag];
        const fieldPath = `${path}/${tag}`;

        if (fieldValue === undefined) {
            if (spec.minOccurs > 0) {
                throw new EncodeError('MissingRequiredValue', 'Missing required value', fieldPath);
            }
            continue;
        }

        if (spec.cardinality !== 'repeated') {
            children.push(encodeNode(spec.node, fieldValue, tag, fieldPath));
            continue;
        }

        if (!Array.isArray(fieldValue)) {
            throw new EncodeError('TypeMismatch', `Expected a list of ${spec.node.name}`, fieldPath);
        }
        if (fieldValue.length < spec.minOccurs) {
            throw new EncodeError('MissingRequiredValue', 'List requires at least one element', fieldPath);
        }
        fieldValue.forEach((item: unknown, index) => {
            children.push(encodeNode(spec.node, item, tag, `${fieldPath}[${index}]`));
        });
    }

    return children;
}

function encodeSimpleContent(node: SimpleContentType, value: RecordValue, name: string, path: string): WireElement {
    const attributes: Record<string, string> = {};

    for (const [attributeName, spec] of Object.entries(node.attributes)) {
        const attribute = value[attributeName];
        const attributePath = `${path}/@${attributeName}`;
        if (attribute === undefined) {
            if (spec.cardinality === 'required') {
                throw new EncodeError('MissingRequiredValue', 'Missing required attribute', attributePath);
            }
            continue;
        }
        attributes[attributeName] = encodeLeaf(spec.node, attribute, attributePath);
    }

    return { name, attributes, text: encodeLeaf(node.value, value.value, path), children: [] };
}
