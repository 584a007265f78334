/**
 * CLI Commands - Public API
 */

export {
  executeSignCommand,
  signFirmwareFile,
  defaultSignedOutputPath,
  type SignCommandDeps,
  type SignCommandOptions,
  type SignFileResult,
} from './sign.js';
export {
  executeVerifyCommand,
  verifyFirmwareFile,
  chunksOf,
  type VerifyCommandDeps,
  type VerifyCommandOptions,
  type VerifyFileResult,
} from './verify.js';
export { executeKeygenCommand, type KeygenCommandDeps } from './keygen.js';
