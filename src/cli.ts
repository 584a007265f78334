#!/usr/bin/env node
/**
 * firmseal CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts and src/firmware/.
 */

import 'reflect-metadata';
import { Command, InvalidArgumentError } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { ILoggerFactory } from './core/logging/index.js';
import type { HmacSha256Port } from './firmware/ports/hmac-sha256.port.js';
import type { RandomEntropyPort } from './firmware/ports/random-entropy.port.js';
import type { HexPort } from './firmware/ports/hex.port.js';
import type { FileSystemPort } from './firmware/ports/fs.port.js';
import type { EnvelopeCryptoDeps } from './firmware/core/envelope.js';
import { Err, formatAppError } from './errors/index.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { toNumericExitCode } from './cli/types/exit-code.js';
import { executeSignCommand, executeVerifyCommand, executeKeygenCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface Wiring {
  readonly terminator: ProcessTerminator;
  readonly config: ValidatedConfig;
  readonly loggers: ILoggerFactory;
  readonly fs: FileSystemPort;
  readonly crypto: EnvelopeCryptoDeps;
  readonly entropy: RandomEntropyPort;
}

function wire(): Wiring {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    console.error(formatAppError(initialized.error));
    process.exit(toNumericExitCode({ kind: 'misuse' }));
  }

  return {
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    loggers: container.resolve<ILoggerFactory>(DI.Logging.Factory),
    fs: container.resolve<FileSystemPort>(DI.Firmware.FileSystem),
    crypto: {
      hmac: container.resolve<HmacSha256Port>(DI.Firmware.Hmac),
      hex: container.resolve<HexPort>(DI.Firmware.Hex),
    },
    entropy: container.resolve<RandomEntropyPort>(DI.Firmware.Entropy),
  };
}

function parseChunkSize(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('Chunk size must be a positive integer.');
  }
  return n;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('firmseal')
  .description('Sign and verify firmware images with HMAC-SHA256')
  .version('0.1.0');

program
  .command('sign <input> <keyHex> [output]')
  .description('Append an HMAC-SHA256 signature to a firmware image')
  .action(async (inputPath: string, keyHex: string, outputPath: string | undefined) => {
    const w = wire();
    const result = await executeSignCommand(inputPath, keyHex, { output: outputPath }, {
      fs: w.fs,
      crypto: w.crypto,
      signedSuffix: w.config.output.signedSuffix,
      logger: w.loggers.create('sign'),
    });
    interpretCliResult(result, w.terminator);
  });

program
  .command('verify <input> <keyHex> [output]')
  .description('Verify a signed firmware image and optionally extract the firmware')
  .option('-c, --chunk-size <bytes>', 'Feed the file in chunks of this size, as a device upload would', parseChunkSize)
  .action(async (inputPath: string, keyHex: string, outputPath: string | undefined, options: { chunkSize?: number }) => {
    const w = wire();
    const result = await executeVerifyCommand(inputPath, keyHex, { output: outputPath, chunkSize: options.chunkSize }, {
      fs: w.fs,
      crypto: w.crypto,
      logger: w.loggers.create('verify'),
    });
    interpretCliResult(result, w.terminator);
  });

program
  .command('keygen')
  .alias('generate-key')
  .description('Generate a new random 256-bit signing key')
  .action(() => {
    const w = wire();
    const result = executeKeygenCommand({
      entropy: w.entropy,
      hex: w.crypto.hex,
      logger: w.loggers.create('keygen'),
    });
    interpretCliResult(result, w.terminator);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatAppError(Err.unexpected('firmseal failed unexpectedly', error)));
  process.exit(toNumericExitCode({ kind: 'general_error' }));
});
