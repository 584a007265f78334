/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult becomes a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Print a CLI result and terminate on failure.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so pino can flush.
      return;

    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}
