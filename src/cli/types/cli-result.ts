/**
 * CLI Result Types
 *
 * Commands return these; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output for CLI display.
 *
 * `data` is machine-consumable text (a generated key) printed bare on stdout
 * so it can be captured by scripts; everything else is decoration.
 */
export interface CliOutput {
  readonly message: string;
  readonly data?: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Misuse failure (bad key text, bad arguments).
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
