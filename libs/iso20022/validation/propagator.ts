/**
 * Composite Validation Propagator
 *
 * Walks a decoded value against its schema node in field declaration order
 * and returns the first violation found. Absent fields are skipped (required
 * presence is a decode concern). List elements are visited in order; the
 * resulting error names the offending leaf element only, never its position.
 */

import {
    ConstraintError,
    ConstraintErrorCode,
    ValidationError
} from '../../errors/bindingErrors.js';
import { checkConstraints, type ConstraintResult, type LeafPrimitive } from '../schema/constraints.js';
import type {
    ChoiceType,
    CompositeType,
    FieldMap,
    Infer,
    LeafType,
    SimpleContentType,
    TypeNode
} from '../schema/types.js';

export interface ValidateOptions {
    /** Reject choices with zero or several populated alternatives. */
    readonly strictChoices?: boolean;
}

export type ValidationResult =
    | { readonly success: true }
    | { readonly success: false; readonly error: ValidationError };

type RecordValue = Readonly<Record<string, unknown>>;

function isRecordValue(value: unknown): value is RecordValue {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLeafPrimitive(value: unknown): value is LeafPrimitive {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function typeMismatch(field: string, expected: string): ValidationError {
    return new ValidationError(
        field,
        new ConstraintError('TypeMismatch', ConstraintErrorCode.TypeMismatch, `is not a valid ${expected}`)
    );
}

/**
 * Leaf-level contract: checks one value against its type's constraints.
 */
export function validateLeaf<T extends LeafPrimitive>(leaf: LeafType<T>, value: T): ConstraintResult {
    return checkConstraints(leaf.constraints, value);
}

/**
 * Record-level contract (also accepts choices and simple-content nodes).
 */
export function validateRecord<N extends CompositeType>(
    node: N,
    value: Infer<N>,
    options: ValidateOptions = {}
): ValidationResult {
    const error = validateNode(node, value, node.name, options);
    return error ? { success: false, error } : { success: true };
}

/**
 * Validates any value against any node.
 * @param field element name reported when the node itself is the offender
 */
export function validateNode(
    node: TypeNode,
    value: unknown,
    field: string,
    options: ValidateOptions = {}
): ValidationError | undefined {
    switch (node.kind) {
        case 'leaf': {
            if (!isLeafPrimitive(value)) return typeMismatch(field, node.name);
            if (typeof value === 'number' && !Number.isFinite(value)) return typeMismatch(field, node.name);
            const result = checkConstraints(node.constraints, value);
            return result.success ? undefined : new ValidationError(field, result.error);
        }
        case 'record':
            if (!isRecordValue(value)) return typeMismatch(field, node.name);
            return validateFields(node.fields, value, options);
        case 'choice':
            return validateChoice(node, value, field, options);
        case 'simple':
            return validateSimpleContent(node, value, field);
    }
}

function validateFields(fields: FieldMap, value: RecordValue, options: ValidateOptions): ValidationError | undefined {
    for (const [tag, spec] of Object.entries(fields)) {
        const fieldValue = value[tag];
        if (fieldValue === undefined) continue;

        if (spec.cardinality === 'repeated') {
            if (!Array.isArray(fieldValue)) return typeMismatch(tag, `list of ${spec.node.name}`);
            for (const item of fieldValue) {
                const error = validateNode(spec.node, item, tag, options);
                if (error) return error;
            }
            continue;
        }

        const error = validateNode(spec.node, fieldValue, tag, options);
        if (error) return error;
    }
    return undefined;
}

function validateChoice(
    node: ChoiceType,
    value: unknown,
    field: string,
    options: ValidateOptions
): ValidationError | undefined {
    if (!isRecordValue(value)) return typeMismatch(field, node.name);

    if (options.strictChoices) {
        const populated = Object.keys(node.alternatives).filter(tag => value[tag] !== undefined).length;
        if (populated !== 1) {
            return new ValidationError(
                field,
                new ConstraintError(
                    'ChoiceViolation',
                    ConstraintErrorCode.ChoiceViolation,
                    `must have exactly one alternative populated, found ${populated}`
                )
            );
        }
    }

    return validateFields(node.alternatives, value, options);
}

function validateSimpleContent(node: SimpleContentType, value: unknown, field: string): ValidationError | undefined {
    if (!isRecordValue(value)) return typeMismatch(field, node.name);

    for (const [name, spec] of Object.entries(node.attributes)) {
        const attribute = value[name];
        if (attribute === undefined) continue;
        const error = validateNode(spec.node, attribute, name);
        if (error) return error;
    }

    // The payload is reported under the owning element's name
    return validateNode(node.value, value.value, field);
}
