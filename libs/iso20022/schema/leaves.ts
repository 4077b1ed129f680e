/**
 * Leaf type builders.
 *
 * Lexical parsing (wire text -> value) is done with zod and is structural:
 * a decimal that is not a number or a code outside its list is a decode
 * failure. The declared constraints are checked separately by the validator.
 */

import { z } from 'zod';
import { Constraints, type Constraint } from './constraints.js';
import type { LeafType } from './types.js';

export interface TextRules {
    readonly minLength?: number;
    readonly maxLength?: number;
    readonly pattern?: string;
}

export interface DecimalRules {
    readonly minInclusive?: number;
    readonly maxInclusive?: number;
}

const DECIMAL_LEXICAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const INDICATOR_LEXICAL = /^(true|false|1|0)$/;

function defineLeaf<T>(
    name: string,
    lexical: z.ZodType<T, z.ZodTypeDef, string>,
    constraints: readonly Constraint[],
    format: (value: T) => string
): LeafType<T> {
    return Object.freeze({
        kind: 'leaf' as const,
        name,
        constraints: Object.freeze([...constraints]),
        parse: (text: string) => lexical.safeParse(text),
        format
    });
}

function textConstraints(rules: TextRules): Constraint[] {
    const constraints: Constraint[] = [];
    if (rules.minLength !== undefined) constraints.push(Constraints.minLength(rules.minLength));
    if (rules.maxLength !== undefined) constraints.push(Constraints.maxLength(rules.maxLength));
    if (rules.pattern !== undefined) constraints.push(Constraints.pattern(rules.pattern));
    return constraints;
}

/**
 * Renders a number without exponent notation, as xs:decimal requires.
 */
export function formatDecimal(value: number): string {
    const text = String(value);
    if (!/e/i.test(text)) {
        return text;
    }
    if (Number.isInteger(value)) {
        return BigInt(value).toString();
    }
    const fixed = value.toFixed(20);
    return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}

/** Free text, identifiers and date/time strings. */
export function text(name: string, rules: TextRules = {}): LeafType<string> {
    return defineLeaf(name, z.string(), textConstraints(rules), value => value);
}

export function decimal(name: string, rules: DecimalRules = {}): LeafType<number> {
    const constraints: Constraint[] = [];
    if (rules.minInclusive !== undefined) constraints.push(Constraints.minValue(rules.minInclusive));
    if (rules.maxInclusive !== undefined) constraints.push(Constraints.maxValue(rules.maxInclusive));
    return defineLeaf(
        name,
        z.string().trim().regex(DECIMAL_LEXICAL).transform(Number),
        constraints,
        formatDecimal
    );
}

/** xs:boolean; written back as `true` / `false`. */
export function indicator(name: string): LeafType<boolean> {
    return defineLeaf(
        name,
        z.string().trim().regex(INDICATOR_LEXICAL).transform(value => value === 'true' || value === '1'),
        [],
        value => (value ? 'true' : 'false')
    );
}

/**
 * Closed code list. The in-memory type is the literal union of the codes.
 */
export function code<V extends string>(name: string, values: readonly [V, ...V[]]): LeafType<V> {
    const members = new Set<string>(values);
    return defineLeaf(
        name,
        z.string().trim().refine((value): value is V => members.has(value)),
        [Constraints.oneOf(values)],
        value => value
    );
}
