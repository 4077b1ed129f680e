import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { BindingError, type ErrorCategory } from './bindingErrors.js';

/**
 * Error Boundary Sanitization
 * Anything thrown across the codec boundary that is not already a binding
 * error is wrapped in a generic message with an incident id; the raw details
 * go to the log only.
 */

export class InternalBindingError extends BindingError {
    readonly category = 'INTERNAL';
    readonly incidentId: string;
    readonly timestamp: string;

    constructor(readonly contextLabel: string, options?: { cause?: unknown }) {
        const incidentId = crypto.randomUUID();
        super(9000, `An internal binding error occurred in ${contextLabel} (incident ${incidentId})`, options);
        this.incidentId = incidentId;
        this.timestamp = new Date().toISOString();
    }
}

export interface ErrorReport {
    readonly code: number;
    readonly category: ErrorCategory;
    readonly name: string;
    readonly message: string;
}

export const ErrorSanitizer = {
    /**
     * Passes binding errors through untouched and wraps everything else.
     */
    sanitize: (err: unknown, contextLabel: string): BindingError => {
        if (err instanceof BindingError) return err;

        let originalErrorMessage: string;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        const wrapped = new InternalBindingError(contextLabel, { cause: err });
        logger.error({
            incidentId: wrapped.incidentId,
            context: contextLabel,
            originalError: originalErrorMessage,
            stack: originalErrorStack
        }, 'Unexpected failure at the binding boundary');

        return wrapped;
    },

    /**
     * Flattens a binding error into a serializable report for host responses.
     */
    report: (err: BindingError): ErrorReport => ({
        code: err.code,
        category: err.category,
        name: err.name,
        message: err.message
    })
};
