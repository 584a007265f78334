/**
 * Application configuration - parse, don't validate.
 *
 * - Zod validates the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives
// =============================================================================

/** Text inserted before the input's extension to name a signed output file. */
export type SignedSuffix = Brand<string, 'SignedSuffix'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly output: { readonly signedSuffix: SignedSuffix };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const EnvSchema = z.object({
  FIRMSEAL_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  FIRMSEAL_SIGNED_SUFFIX: z
    .string()
    .min(1, 'FIRMSEAL_SIGNED_SUFFIX cannot be empty')
    .refine((v) => !v.includes('/') && !v.includes('\\'), 'FIRMSEAL_SIGNED_SUFFIX cannot contain a path separator')
    .default('_signed'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.FIRMSEAL_LOG_LEVEL },
    output: { signedSuffix: env.FIRMSEAL_SIGNED_SUFFIX as SignedSuffix },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
