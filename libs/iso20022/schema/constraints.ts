/**
 * Field Constraint Model
 * Value-level rules attached to leaf types. Each rule is a pure predicate;
 * a leaf's rules are evaluated in declaration order and the first failure wins.
 */

import { ConstraintError, ConstraintErrorCode } from '../../errors/bindingErrors.js';

export type LeafPrimitive = string | number | boolean;

export type Constraint =
    | { readonly kind: 'Pattern'; readonly parameter: string; readonly matcher: RegExp }
    | { readonly kind: 'MinLength'; readonly parameter: number }
    | { readonly kind: 'MaxLength'; readonly parameter: number }
    | { readonly kind: 'MinValue'; readonly parameter: number }
    | { readonly kind: 'MaxValue'; readonly parameter: number }
    | { readonly kind: 'Enumeration'; readonly parameter: readonly string[] };

export type ConstraintKind = Constraint['kind'];

export type ConstraintResult =
    | { readonly success: true }
    | { readonly success: false; readonly error: ConstraintError };

export const Constraints = {
    /** Full-match regular expression; the source text is anchored on both ends. */
    pattern: (source: string): Constraint => ({
        kind: 'Pattern',
        parameter: source,
        matcher: new RegExp(`^(?:${source})$`)
    }),
    minLength: (min: number): Constraint => ({ kind: 'MinLength', parameter: min }),
    maxLength: (max: number): Constraint => ({ kind: 'MaxLength', parameter: max }),
    minValue: (min: number): Constraint => ({ kind: 'MinValue', parameter: min }),
    maxValue: (max: number): Constraint => ({ kind: 'MaxValue', parameter: max }),
    oneOf: (values: readonly string[]): Constraint => ({ kind: 'Enumeration', parameter: Object.freeze([...values]) })
};

// Character count in code points, not UTF-16 units
function lengthOf(value: LeafPrimitive): number {
    return Array.from(String(value)).length;
}

function numericOf(value: LeafPrimitive): number {
    return typeof value === 'number' ? value : Number(value);
}

/**
 * Evaluates one rule against a value.
 * @returns the violation, or undefined when the rule holds
 */
export function checkConstraint(constraint: Constraint, value: LeafPrimitive): ConstraintError | undefined {
    switch (constraint.kind) {
        case 'MinLength':
            return lengthOf(value) < constraint.parameter
                ? new ConstraintError('LengthOutOfRange', ConstraintErrorCode.TooShort,
                    `is shorter than the minimum length of ${constraint.parameter}`)
                : undefined;
        case 'MaxLength':
            return lengthOf(value) > constraint.parameter
                ? new ConstraintError('LengthOutOfRange', ConstraintErrorCode.TooLong,
                    `exceeds the maximum length of ${constraint.parameter}`)
                : undefined;
        case 'MinValue':
            // NaN fails the bound as well
            return !(numericOf(value) >= constraint.parameter)
                ? new ConstraintError('BelowMinimum', ConstraintErrorCode.BelowMinimum,
                    `is less than the minimum value of ${constraint.parameter}`)
                : undefined;
        case 'MaxValue':
            return !(numericOf(value) <= constraint.parameter)
                ? new ConstraintError('AboveMaximum', ConstraintErrorCode.AboveMaximum,
                    `exceeds the maximum value of ${constraint.parameter}`)
                : undefined;
        case 'Pattern':
            return !constraint.matcher.test(String(value))
                ? new ConstraintError('PatternMismatch', ConstraintErrorCode.PatternMismatch,
                    'does not match the required pattern')
                : undefined;
        case 'Enumeration':
            return !constraint.parameter.includes(String(value))
                ? new ConstraintError('NotEnumerated', ConstraintErrorCode.NotEnumerated,
                    'is not one of the permitted values')
                : undefined;
    }
}

export function satisfies(constraint: Constraint, value: LeafPrimitive): boolean {
    return checkConstraint(constraint, value) === undefined;
}

/**
 * Applies every rule in order, stopping at the first violation.
 */
export function checkConstraints(constraints: readonly Constraint[], value: LeafPrimitive): ConstraintResult {
    for (const constraint of constraints) {
        const error = checkConstraint(constraint, value);
        if (error) {
            return { success: false, error };
        }
    }
    return { success: true };
}
