import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/**
 * Application-level failures (outside the firmware error taxonomy).
 */
export type AppError = ConfigInvalidError | UnexpectedError;

/**
 * Branded type for validated config; callers can require it without re-checking.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
