export type { AppError, ConfigIssue, ConfigInvalidError, UnexpectedError, ValidatedAppConfig } from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
