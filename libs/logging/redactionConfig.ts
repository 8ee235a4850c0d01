/**
 * Centralized Redaction Configuration
 * Keys that must never reach logs in clear text.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'headers.authorization', '*.headers.authorization',
    'token', '*.token',
    'bearer', '*.bearer',
    'secret', '*.secret',
    'jwtSecret', '*.jwtSecret',
    'password', '*.password',

    // Key material
    'privateKey', '*.privateKey',
    'mnemonic', '*.mnemonic',

    // Signed authorizations are single-use bearer material until consumed
    'signature', '*.signature'
];

export const REDACT_CENSOR = '[REDACTED]';
