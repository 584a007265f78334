import pino from 'pino';
import type { DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Create the root pino logger.
 *
 * - Sync output to stderr (stdout carries command output such as a generated key)
 * - JSON format for machine parsing
 * - Redaction of key material
 */
export function createRootLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 * Registered once in the container.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel, destination?: DestinationStream) {
    this._root = createRootLogger(level, destination);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
