/**
 * Runtime mode of the current process.
 * Injected (DI), not inferred ad-hoc inside commands.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'test' };
