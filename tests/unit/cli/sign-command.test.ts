import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs/promises';

// Mock chalk
vi.mock('chalk', () => ({
  default: {
    red: (str: string) => str,
    green: (str: string) => str,
    yellow: (str: string) => str,
    gray: (str: string) => str,
    white: (str: string) => str,
  },
}));

import { NodeFileSystem } from '../../../src/firmware/infra/local/fs/index.js';
import { NodeHmacSha256 } from '../../../src/firmware/infra/local/hmac-sha256/index.js';
import { NodeHex } from '../../../src/firmware/infra/local/hex/index.js';
import { createRootLogger } from '../../../src/core/logging/index.js';
import {
  defaultSignedOutputPath,
  executeSignCommand,
  signFirmwareFile,
  type SignCommandDeps,
} from '../../../src/cli/commands/sign.js';
import { InMemoryFileSystem } from '../../fakes/firmware/index.js';

const ZERO_KEY = '00'.repeat(32);
const crypto = { hmac: new NodeHmacSha256(), hex: new NodeHex() };
const logger = createRootLogger('silent');

describe('defaultSignedOutputPath', () => {
  it.each([
    ['firmware.bin', 'firmware_signed.bin'],
    ['firmware', 'firmware_signed'],
    ['build/app.v2.bin', 'build/app.v2_signed.bin'],
    ['build.d/firmware', 'build.d/firmware_signed'],
    ['.firmware', '.firmware_signed'],
  ])('%s → %s', (input, expected) => {
    expect(defaultSignedOutputPath(input, '_signed')).toBe(expected);
  });

  it('uses the configured suffix', () => {
    expect(defaultSignedOutputPath('fw.bin', '.sig')).toBe('fw.sig.bin');
  });
});

describe('sign command (node fs)', () => {
  let tempDir: string;
  let deps: SignCommandDeps;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'firmseal-sign-test-'));
    deps = { fs: new NodeFileSystem(), crypto, signedSuffix: '_signed', logger };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('writes payload || tag next to the input by default', async () => {
    const input = path.join(tempDir, 'firmware.bin');
    await fs.writeFile(input, 'DeskBuddyFW');

    const result = await signFirmwareFile(input, ZERO_KEY, {}, deps);

    expect(result).toEqual({
      kind: 'signed',
      outputPath: path.join(tempDir, 'firmware_signed.bin'),
      payloadLength: 11,
      tagHex: 'fef82c879f38262c92b6676ac6fe621dd9578b6f7715864a15486c222d997cba',
      totalLength: 43,
    });

    const written = await fs.readFile(path.join(tempDir, 'firmware_signed.bin'));
    expect(written.subarray(0, 11).toString('utf8')).toBe('DeskBuddyFW');
    expect(written.subarray(11).toString('hex')).toBe('fef82c879f38262c92b6676ac6fe621dd9578b6f7715864a15486c222d997cba');
  });

  it('honours an explicit output path', async () => {
    const input = path.join(tempDir, 'firmware.bin');
    const output = path.join(tempDir, 'release.bin');
    await fs.writeFile(input, Buffer.from([0xde, 0xad, 0xbe, 0xef]));

    const result = await executeSignCommand(input, ZERO_KEY, { output }, deps);

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: `Signed firmware: ${output} (36 bytes)`,
        details: [
          'Firmware size: 4 bytes',
          'Signature: c30fc4a1f3887db6911cc1d7a662d582b557110446603bb82e6543db882b384e',
        ],
      },
    });
    expect((await fs.readdir(tempDir)).sort()).toEqual(['firmware.bin', 'release.bin']);
  });

  it('maps a missing input to a read failure with exit code 1', async () => {
    const result = await executeSignCommand(path.join(tempDir, 'nope.bin'), ZERO_KEY, {}, deps);

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') throw new Error('Expected failure');
    expect(result.exitCode).toEqual({ kind: 'general_error' });
    expect(result.output.message).toBe(`Failed to read file: Not found: ${path.join(tempDir, 'nope.bin')}`);
  });
});

describe('sign command (in-memory fs)', () => {
  it('rejects a bad key as misuse without reading the input', async () => {
    const fake = new InMemoryFileSystem();
    fake.seed('/fw/firmware.bin', new Uint8Array([1]));
    const deps: SignCommandDeps = { fs: fake, crypto, signedSuffix: '_signed', logger };

    const result = await executeSignCommand('/fw/firmware.bin', 'abc', {}, deps);

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: {
        message: 'Key must be 64 hex characters, got 3',
        suggestions: ['Generate a key with `firmseal keygen`'],
      },
    });
    expect(fake.calls).toEqual([]);
  });

  it('reports non-hex keys as misuse', async () => {
    const fake = new InMemoryFileSystem();
    const deps: SignCommandDeps = { fs: fake, crypto, signedSuffix: '_signed', logger };

    const result = await executeSignCommand('/fw/firmware.bin', 'g'.repeat(64), {}, deps);

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') throw new Error('Expected failure');
    expect(result.exitCode).toEqual({ kind: 'misuse' });
    expect(result.output.message).toBe('Key must be valid hexadecimal');
  });

  it('leaves no output behind when the write fails', async () => {
    const fake = new InMemoryFileSystem();
    fake.seed('/fw/firmware.bin', new Uint8Array([1, 2, 3]));
    fake.failNext('fsyncFile', { code: 'FS_IO_ERROR', message: 'FS error at fd:3: EIO' });
    const deps: SignCommandDeps = { fs: fake, crypto, signedSuffix: '_signed', logger };

    const result = await signFirmwareFile('/fw/firmware.bin', ZERO_KEY, {}, deps);

    expect(result).toEqual({ kind: 'write_error', error: { code: 'FS_IO_ERROR', message: 'FS error at fd:3: EIO' } });
    expect(fake.paths()).toEqual(['/fw/firmware.bin']);
  });
});
