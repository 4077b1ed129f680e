/**
 * Schema node descriptors and the record types inferred from them.
 *
 * A message schema is a tree of four node kinds:
 * - leaf: a scalar with constraints (text, decimal, indicator, code)
 * - record: an ordered set of named fields, one wire element
 * - choice: mutually exclusive alternatives, every alternative optional
 * - simple: leaf attributes plus a scalar text payload (currency + amount)
 *
 * Record property names are the wire element names, so `Infer<typeof GroupHeader93>`
 * reads `{ MsgId: string; CreDtTm: string; ... }`.
 */

import type { z } from 'zod';
import type { Constraint } from './constraints.js';

export type Cardinality = 'required' | 'optional' | 'repeated';

export interface LeafType<T = unknown> {
    readonly kind: 'leaf';
    readonly name: string;
    readonly constraints: readonly Constraint[];
    /** Lexical parse of the wire text into the in-memory value. */
    parse(text: string): z.SafeParseReturnType<string, T>;
    /** Canonical wire text for a value. */
    format(value: T): string;
}

export interface FieldSpec<N extends TypeNode = TypeNode, C extends Cardinality = Cardinality, M extends number = number> {
    readonly node: N;
    readonly cardinality: C;
    /** 1 for required fields and non-empty lists, 0 otherwise. */
    readonly minOccurs: M;
}

export type FieldMap = { readonly [tag: string]: FieldSpec };

export type AttributeMap = { readonly [name: string]: FieldSpec<LeafType, 'required' | 'optional'> };

export interface RecordType<F extends FieldMap = FieldMap> {
    readonly kind: 'record';
    readonly name: string;
    readonly fields: F;
}

export interface ChoiceType<F extends FieldMap = FieldMap> {
    readonly kind: 'choice';
    readonly name: string;
    readonly alternatives: F;
}

export interface SimpleContentType<A extends AttributeMap = AttributeMap, V = unknown> {
    readonly kind: 'simple';
    readonly name: string;
    readonly attributes: A;
    readonly value: LeafType<V>;
}

export type CompositeType = RecordType | ChoiceType | SimpleContentType;

export type TypeNode = LeafType | CompositeType;

// --- Inference ---

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type IsOptionalField<S> =
    S extends { readonly cardinality: 'optional' } ? true
    : S extends { readonly cardinality: 'repeated'; readonly minOccurs: 0 } ? true
    : false;

type FieldValue<S> =
    S extends FieldSpec<infer N, infer C>
        ? C extends 'repeated' ? readonly Infer<N>[] : Infer<N>
        : never;

type RequiredKeys<F> = { [K in keyof F]: IsOptionalField<F[K]> extends true ? never : K }[keyof F];
type OptionalKeys<F> = { [K in keyof F]: IsOptionalField<F[K]> extends true ? K : never }[keyof F];

export type InferFields<F> = Simplify<
    { readonly [K in RequiredKeys<F>]: FieldValue<F[K]> } &
    { readonly [K in OptionalKeys<F>]?: FieldValue<F[K]> }
>;

export type InferChoice<F> = Simplify<{ readonly [K in keyof F]?: FieldValue<F[K]> }>;

/** In-memory value type described by a schema node. */
export type Infer<N> =
    N extends LeafType<infer T> ? T
    : N extends RecordType<infer F> ? InferFields<F>
    : N extends ChoiceType<infer F> ? InferChoice<F>
    : N extends SimpleContentType<infer A, infer V> ? Simplify<InferFields<A> & { readonly value: V }>
    : never;
