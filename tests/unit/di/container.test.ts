import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  initializeContainer,
  resetContainer,
  isInitialized,
  container,
} from '../../../src/di/container.js';
import { DI } from '../../../src/di/tokens.js';
import type { ValidatedConfig } from '../../../src/config/app-config.js';
import type { ProcessTerminator } from '../../../src/runtime/ports/process-terminator.js';
import type { FileSystemPort } from '../../../src/firmware/ports/fs.port.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';
import { NodeHex } from '../../../src/firmware/infra/local/hex/index.js';
import { InMemoryFileSystem } from '../../fakes/firmware/index.js';

describe('DI container', () => {
  beforeEach(() => {
    resetContainer();
  });

  afterEach(() => {
    resetContainer();
  });

  it('registers every port from the environment', () => {
    const result = initializeContainer({ runtimeMode: { kind: 'test' }, env: { FIRMSEAL_SIGNED_SUFFIX: '.sig' } });

    expect(result.isOk()).toBe(true);
    expect(isInitialized()).toBe(true);
    expect(container.resolve<ValidatedConfig>(DI.Config.App).output.signedSuffix).toBe('.sig');
    expect(container.resolve(DI.Firmware.Hex)).toBeInstanceOf(NodeHex);
    expect(container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator)).toBeInstanceOf(
      ThrowingProcessTerminator
    );
    expect(container.isRegistered(DI.Firmware.Hmac)).toBe(true);
    expect(container.isRegistered(DI.Firmware.Entropy)).toBe(true);
    expect(container.isRegistered(DI.Logging.Factory)).toBe(true);
  });

  it('returns the config error and stays uninitialized', () => {
    const result = initializeContainer({ runtimeMode: { kind: 'test' }, env: { FIRMSEAL_LOG_LEVEL: 'loud' } });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()._tag).toBe('ConfigInvalid');
    expect(isInitialized()).toBe(false);
  });

  it('keeps a file system registered before initialization', () => {
    const fake = new InMemoryFileSystem();
    container.register<FileSystemPort>(DI.Firmware.FileSystem, { useValue: fake });

    initializeContainer({ runtimeMode: { kind: 'test' }, env: {} });

    expect(container.resolve<FileSystemPort>(DI.Firmware.FileSystem)).toBe(fake);
  });

  it('defines only the runtime tokens the CLI resolves', () => {
    expect(Object.keys(DI.Runtime)).toEqual(['ProcessTerminator']);
  });

  it('is idempotent', () => {
    initializeContainer({ runtimeMode: { kind: 'test' }, env: {} });
    const first = container.resolve(DI.Firmware.Hex);

    initializeContainer({ runtimeMode: { kind: 'test' }, env: { FIRMSEAL_LOG_LEVEL: 'loud' } });

    expect(container.resolve(DI.Firmware.Hex)).toBe(first);
  });
});
