/**
 * Centralized Redaction Configuration
 * Keys that must never appear in log output.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'cookie', '*.cookie',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Database (Root and Nested)
    'connectionString', '*.connectionString',
    'DB_PASSWORD', '*.DB_PASSWORD',
];

export const REDACT_CENSOR = '[REDACTED]';
