/**
 * Redaction configuration for pino.
 *
 * Handler payloads are opaque and may embed credentials; the bearer token is
 * a correlation id and stays visible.
 */
export const REDACTION_CONFIG = {
  paths: [
    // Top-level sensitive fields
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',
    'credentials',

    // One level nested (*.field)
    '*.secret',
    '*.password',
    '*.apiKey',
    '*.credentials',

    // AWS credential shapes
    '*.accessKeyId',
    '*.secretAccessKey',
    '*.sessionToken',
    'callbackContext.*.secretAccessKey',

    // HTTP headers
    'headers.authorization',
    'headers.Authorization',
    'headers.x-api-key',
  ],
  censor: '[REDACTED]',
};
