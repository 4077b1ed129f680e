/**
 * Wire -> record decoding.
 *
 * Fails on the first structural problem with a DecodeError carrying the element
 * path; a partially built value is never returned. Field constraints are not
 * checked here: decoding succeeds for values that may later fail validation.
 */

import { DecodeError } from '../../errors/bindingErrors.js';
import type {
    ChoiceType,
    FieldMap,
    FieldSpec,
    Infer,
    LeafType,
    SimpleContentType,
    TypeNode
} from '../schema/types.js';
import type { WireElement } from './wireElement.js';

export interface DecodeOptions {
    /** Child elements the schema does not declare: skipped (default) or rejected. */
    readonly unknownElements?: 'ignore' | 'reject';
}

/**
 * Decodes one element against a schema node.
 * @param path path of `element` used in error reports; defaults to its name
 */
export function decodeElement<N extends TypeNode>(
    node: N,
    element: WireElement,
    options: DecodeOptions = {},
    path: string = element.name
): Infer<N> {
    // The walk below builds exactly the shape the node describes
    return decodeNode(node, element, path, options) as Infer<N>;
}

function decodeNode(node: TypeNode, element: WireElement, path: string, options: DecodeOptions): unknown {
    switch (node.kind) {
        case 'leaf':
            return decodeLeaf(node, textOf(element, path), path);
        case 'record':
            return decodeFields(node.fields, element, path, options);
        case 'choice':
            return decodeChoice(node, element, path, options);
        case 'simple':
            return decodeSimpleContent(node, element, path);
    }
}

// Leaf and simple-content elements carry text only
function textOf(element: WireElement, path: string): string {
    const [child] = element.children;
    if (child !== undefined) {
        throw new DecodeError('InvalidValue', `Element ${element.name} must not contain element ${child.name}`, path);
    }
    return element.text ?? '';
}

function decodeLeaf(leaf: LeafType, text: string, path: string): unknown {
    const result = leaf.parse(text);
    if (!result.success) {
        throw new DecodeError('InvalidValue', `"${text}" is not a valid ${leaf.name}`, path);
    }
    return result.data;
}

function groupChildren(element: WireElement): Map<string, WireElement[]> {
    const groups = new Map<string, WireElement[]>();
    for (const child of element.children) {
        const group = groups.get(child.name);
        if (group) {
            group.push(child);
        } else {
            groups.set(child.name, [child]);
        }
    }
    return groups;
}

function decodeFields(
    fields: FieldMap,
    element: WireElement,
    path: string,
    options: DecodeOptions
): Record<string, unknown> {
    const children = groupChildren(element);

    if (options.unknownElements === 'reject') {
        for (const name of children.keys()) {
            if (!Object.hasOwn(fields, name)) {
                throw new DecodeError('UnexpectedElement', `Element ${name} is not part of ${element.name}`, `${path}/${name}`);
            }
        }
    }

    const decoded: Record<string, unknown> = {};
    for (const [tag, spec] of Object.entries(fields)) {
        const value = decodeField(spec, children.get(tag) ?? [], `${path}/${tag}`, options);
        if (value !== undefined) {
            decoded[tag] = value;
        }
    }
    return decoded;
}

function decodeField(
    spec: FieldSpec,
    matches: readonly WireElement[],
    path: string,
    options: DecodeOptions
): unknown {
    if (matches.length < spec.minOccurs) {
        throw new DecodeError('MissingRequiredField', 'Missing required element', path);
    }

    if (spec.cardinality === 'repeated') {
        if (matches.length === 0) return undefined;
        return matches.map((match, index) => decodeNode(spec.node, match, `${path}[${index}]`, options));
    }

    if (matches.length > 1) {
        throw new DecodeError('DuplicateElement', `Element occurs ${matches.length} times, at most once allowed`, path);
    }

    const [match] = matches;
    return match === undefined ? undefined : decodeNode(spec.node, match, path, options);
}

function decodeChoice(
    node: ChoiceType,
    element: WireElement,
    path: string,
    options: DecodeOptions
): Record<string, unknown> {
    // Alternatives decode like optional fields; exclusivity is left to validation
    return decodeFields(node.alternatives, element, path, options);
}

function decodeSimpleContent(node: SimpleContentType, element: WireElement, path: string): Record<string, unknown> {
    const decoded: Record<string, unknown> = {};

    for (const [name, spec] of Object.entries(node.attributes)) {
        const raw = element.attributes[name];
        const attributePath = `${path}/@${name}`;
        if (raw === undefined) {
            if (spec.cardinality === 'required') {
                throw new DecodeError('MissingRequiredField', 'Missing required attribute', attributePath);
            }
            continue;
        }
        decoded[name] = decodeLeaf(spec.node, raw, attributePath);
    }

    decoded.value = decodeLeaf(node.value, textOf(element, path), path);
    return decoded;
}
