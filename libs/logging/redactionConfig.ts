/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output in clear: party names, account
 * identifiers and postal details that appear in decoded messages, plus
 * credentials a host might attach to a log context.
 */
export const REDACT_KEYS = [
    // Account identifiers (Root and Nested)
    'IBAN', '*.IBAN',
    'Acct', '*.Acct',
    'DbtrAcct', '*.DbtrAcct',
    'CdtrAcct', '*.CdtrAcct',

    // Party details (Root and Nested)
    'Nm', '*.Nm',
    'PstlAdr', '*.PstlAdr',
    'BirthDt', '*.BirthDt',
    'EmailAdr', '*.EmailAdr',
    'PhneNb', '*.PhneNb',

    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'password', '*.password',
    'secret', '*.secret',
    'token', '*.token',
];

export const REDACT_CENSOR = '[REDACTED]';
