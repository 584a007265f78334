import type { Logger, LogLevel } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Bootstrap logger for use BEFORE the DI container is initialized
 * (config loading, container wiring).
 *
 * Reads FIRMSEAL_LOG_LEVEL directly because config is not parsed yet;
 * anything unrecognized means silent.
 */
let _bootstrapLogger: Logger | null = null;

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((l) => l === value);
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const requested = process.env['FIRMSEAL_LOG_LEVEL']?.toLowerCase();
    _bootstrapLogger = createRootLogger(isLogLevel(requested) ? requested : 'silent');
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
