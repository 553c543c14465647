/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent key-material leakage.
 */
export const REDACT_KEYS = [
    // Key material (Root and Nested)
    'secretKey', '*.secretKey',
    'signSk', '*.signSk',
    'encSk', '*.encSk',
    'encKey', '*.encKey',
    'symmetricKey', '*.symmetricKey',
    'key', '*.key',
    'nonce', '*.nonce',

    // IPC payloads (Root and Nested)
    'token', '*.token',
    'appKeys', '*.appKeys',
    'bootstrapConfig', '*.bootstrapConfig',

    // Signatures and raw content
    'signature', '*.signature',
    'plaintext', '*.plaintext',
    'content', '*.content'
];

export const REDACT_CENSOR = '[REDACTED]';
