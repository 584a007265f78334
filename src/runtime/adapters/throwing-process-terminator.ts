import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process.
 * Records the requested code so tests can assert on it, then throws.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  readonly calls: ExitCode[] = [];

  terminate(code: ExitCode): never {
    this.calls.push(code);
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
