/**
 * Record, choice and simple-content builders plus the field cardinality helpers.
 *
 * @example
 * const GenericIdentification30 = record('GenericIdentification30', {
 *     Id: required(Exact4AlphaNumericText),
 *     Issr: required(Max35Text),
 *     SchmeNm: optional(Max35Text),
 * });
 */

import type {
    AttributeMap,
    ChoiceType,
    FieldMap,
    FieldSpec,
    LeafType,
    RecordType,
    SimpleContentType,
    TypeNode
} from './types.js';

export function required<N extends TypeNode>(node: N): FieldSpec<N, 'required', 1> {
    return Object.freeze({ node, cardinality: 'required' as const, minOccurs: 1 as const });
}

export function optional<N extends TypeNode>(node: N): FieldSpec<N, 'optional', 0> {
    return Object.freeze({ node, cardinality: 'optional' as const, minOccurs: 0 as const });
}

/** 0..n occurrences; an absent list is omitted from the record. */
export function list<N extends TypeNode>(node: N): FieldSpec<N, 'repeated', 0> {
    return Object.freeze({ node, cardinality: 'repeated' as const, minOccurs: 0 as const });
}

/** 1..n occurrences. */
export function nonEmptyList<N extends TypeNode>(node: N): FieldSpec<N, 'repeated', 1> {
    return Object.freeze({ node, cardinality: 'repeated' as const, minOccurs: 1 as const });
}

export function record<F extends FieldMap>(name: string, fields: F): RecordType<F> {
    return Object.freeze({ kind: 'record' as const, name, fields });
}

/**
 * "Exactly one of N" alternatives. Declare each alternative with `optional`
 * (or `list` for a repeated alternative); exclusivity is a validation option.
 */
export function choice<F extends FieldMap>(name: string, alternatives: F): ChoiceType<F> {
    return Object.freeze({ kind: 'choice' as const, name, alternatives });
}

export function simpleContent<A extends AttributeMap, V>(
    name: string,
    attributes: A,
    value: LeafType<V>
): SimpleContentType<A, V> {
    return Object.freeze({ kind: 'simple' as const, name, attributes, value });
}
