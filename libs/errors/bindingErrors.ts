/**
 * Binding Error Taxonomy
 * Canonical errors for decode, encode, constraint and validation failures.
 * Every error carries a stable numeric code alongside its message so hosts
 * can branch on the code without parsing text.
 */

export type ErrorCategory =
    | 'DECODE'
    | 'ENCODE'
    | 'CONSTRAINT'
    | 'VALIDATION'
    | 'CATALOG'
    | 'CONFIG'
    | 'INTERNAL';

/** Code shared by every "no such message type" failure, whatever the operation. */
export const UNKNOWN_MESSAGE_TYPE_CODE = 9999;

export abstract class BindingError extends Error {
    abstract readonly category: ErrorCategory;

    constructor(readonly code: number, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

// --- Constraint violations (leaf level) ---

export const ConstraintErrorCode = {
    TooShort: 1001,
    TooLong: 1002,
    BelowMinimum: 1003,
    AboveMaximum: 1004,
    PatternMismatch: 1005,
    NotEnumerated: 1006,
    ChoiceViolation: 1007,
    TypeMismatch: 1008,
} as const;

export type ConstraintViolationKind =
    | 'LengthOutOfRange'
    | 'BelowMinimum'
    | 'AboveMaximum'
    | 'PatternMismatch'
    | 'NotEnumerated'
    | 'ChoiceViolation'
    | 'TypeMismatch';

export class ConstraintError extends BindingError {
    readonly category = 'CONSTRAINT';

    /**
     * @param detail Predicate wording without a subject, e.g. "exceeds the maximum length of 35".
     */
    constructor(readonly kind: ConstraintViolationKind, code: number, readonly detail: string) {
        super(code, `value ${detail}`);
    }
}

/**
 * First constraint violation met while walking a record.
 * Carries the name of the offending element and nothing about where it sits
 * in the tree.
 */
export class ValidationError extends BindingError {
    readonly category = 'VALIDATION';

    constructor(readonly field: string, readonly violation: ConstraintError) {
        super(violation.code, `${field} ${violation.detail}`, { cause: violation });
    }

    get kind(): ConstraintViolationKind {
        return this.violation.kind;
    }
}

// --- Decode failures (fatal for the message) ---

export const DecodeErrorCode = {
    MalformedInput: 2001,
    MissingRequiredField: 2002,
    InvalidValue: 2003,
    DuplicateElement: 2004,
    UnexpectedElement: 2005,
    NamespaceMismatch: 2006,
    UnknownMessageType: UNKNOWN_MESSAGE_TYPE_CODE,
} as const;

export type DecodeErrorKind = keyof typeof DecodeErrorCode;

export class DecodeError extends BindingError {
    readonly category = 'DECODE';

    /**
     * @param path Slash-separated element path, e.g. `FIToFICstmrCdtTrf/CdtTrfTxInf[1]/PmtId`.
     */
    constructor(
        readonly kind: DecodeErrorKind,
        message: string,
        readonly path: string = '',
        options?: { cause?: unknown }
    ) {
        super(DecodeErrorCode[kind], path ? `${message} (at ${path})` : message, options);
    }
}

// --- Encode failures ---

export const EncodeErrorCode = {
    MissingRequiredValue: 3001,
    TypeMismatch: 3002,
} as const;

export type EncodeErrorKind = keyof typeof EncodeErrorCode;

export class EncodeError extends BindingError {
    readonly category = 'ENCODE';

    constructor(readonly kind: EncodeErrorKind, message: string, readonly path: string = '') {
        super(EncodeErrorCode[kind], path ? `${message} (at ${path})` : message);
    }
}

// --- Catalog / configuration ---

export const CatalogErrorCode = {
    DuplicateMessageTag: 4001,
    DuplicateIdentifier: 4002,
    UnknownMessageType: UNKNOWN_MESSAGE_TYPE_CODE,
} as const;

export type CatalogErrorKind = keyof typeof CatalogErrorCode;

export class CatalogError extends BindingError {
    readonly category = 'CATALOG';

    constructor(readonly kind: CatalogErrorKind, message: string) {
        super(CatalogErrorCode[kind], message);
    }
}

export class ConfigurationError extends BindingError {
    readonly category = 'CONFIG';

    constructor(readonly violations: readonly string[]) {
        super(5001, `Invalid binding configuration: ${violations.join('; ')}`);
    }
}

export function isBindingError(error: unknown): error is BindingError {
    return error instanceof BindingError;
}
