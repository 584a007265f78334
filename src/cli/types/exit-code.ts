import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for CLI commands.
 * Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - successful execution
  | { kind: 'general_error' }  // 1 - I/O failure, rejected signature, unavailable entropy
  | { kind: 'misuse' };        // 2 - bad key text, bad arguments

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Convert ExitCode to numeric value for raw process.exit().
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
