/**
 * Keygen Command
 *
 * Prints a fresh 256-bit signing key. The key is printed, never stored.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { firmwareErrorToCliResult } from '../error-mapping.js';
import type { KeyGeneratorDeps } from '../../firmware/core/key-generator.js';
import { generateKey } from '../../firmware/core/key-generator.js';
import type { Logger } from '../../core/logging/index.js';

export interface KeygenCommandDeps extends KeyGeneratorDeps {
  readonly logger: Logger;
}

export function executeKeygenCommand(deps: KeygenCommandDeps): CliResult {
  const generated = generateKey(deps);
  if (generated.isErr()) {
    deps.logger.error({ code: generated.error.code }, 'Key generation failed');
    return firmwareErrorToCliResult(generated.error);
  }

  deps.logger.info('Signing key generated');
  return success({
    message: 'Generated signing key',
    data: generated.value,
    suggestions: [
      'Store this key securely; anyone holding it can sign firmware',
      'Provision it on the device out of band (set via API or compile it in)',
    ],
  });
}
