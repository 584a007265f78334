// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

// Redaction config (for testing/verification)
export { REDACTION_CONFIG } from './redaction.js';
