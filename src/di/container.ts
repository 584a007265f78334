import 'reflect-metadata';
import { container } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import type { HmacSha256Port } from '../firmware/ports/hmac-sha256.port.js';
import type { RandomEntropyPort } from '../firmware/ports/random-entropy.port.js';
import type { HexPort } from '../firmware/ports/hex.port.js';
import type { FileSystemPort } from '../firmware/ports/fs.port.js';
import { NodeHmacSha256 } from '../firmware/infra/local/hmac-sha256/index.js';
import { NodeRandomEntropy } from '../firmware/infra/local/random-entropy/index.js';
import { NodeHex } from '../firmware/infra/local/hex/index.js';
import { NodeFileSystem } from '../firmware/infra/local/fs/index.js';

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
}

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into commands.
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function registerRuntime(mode: RuntimeMode): void {
  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

function registerConfig(env: Record<string, string | undefined>): Result<ValidatedConfig, ConfigInvalidError> {
  // Tests may inject config before initialization; keep theirs.
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<ValidatedConfig>(DI.Config.App));
  }

  const configResult = loadConfig({ env });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(configResult.value);
}

function registerFirmwarePorts(): void {
  container.register<HmacSha256Port>(DI.Firmware.Hmac, { useValue: new NodeHmacSha256() });
  container.register<RandomEntropyPort>(DI.Firmware.Entropy, { useValue: new NodeRandomEntropy() });
  container.register<HexPort>(DI.Firmware.Hex, { useValue: new NodeHex() });
  if (!container.isRegistered(DI.Firmware.FileSystem)) {
    container.register<FileSystemPort>(DI.Firmware.FileSystem, { useValue: new NodeFileSystem() });
  }
}

/**
 * Wire every port. Idempotent.
 *
 * Config errors are returned, not thrown; the composition root decides how
 * to report them.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const log = createBootstrapLogger('container');

  registerRuntime(options.runtimeMode ?? detectRuntimeMode());

  const config = registerConfig(options.env ?? process.env);
  if (config.isErr()) {
    log.error({ issues: config.error.issues }, 'Configuration rejected');
    return err(config.error);
  }

  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useValue: new PinoLoggerFactory(config.value.logging.level),
    });
  }

  registerFirmwarePorts();

  initialized = true;
  log.debug('Container initialized');
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
