/**
 * Redaction configuration for pino.
 *
 * Key material must never reach a log line, whatever field name a caller
 * picks for it.
 */
export const REDACTION_CONFIG = {
  paths: [
    'key',
    'keyHex',
    'keyBytes',
    'secret',

    '*.key',
    '*.keyHex',
    '*.keyBytes',
    '*.secret',

    'args.key',
    'args.keyHex',
  ],
  censor: '[REDACTED]',
};
