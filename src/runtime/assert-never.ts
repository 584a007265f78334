/**
 * Exhaustiveness helper for discriminated unions (error codes, exit codes).
 * A new union member without a `case` fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
