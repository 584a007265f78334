import { describe, it, expect, vi, afterEach } from 'vitest';

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

import { formatOutput, formatResult, printResult } from '../../../src/cli/output-formatter.js';
import { success, failure } from '../../../src/cli/types/cli-result.js';
import { toNumericExitCode } from '../../../src/cli/types/exit-code.js';

describe('formatOutput', () => {
  it('renders message, details and suggestions in order', () => {
    const text = formatOutput({
      message: 'Signed firmware: fw_signed.bin (36 bytes)',
      details: ['Firmware size: 4 bytes'],
      suggestions: ['Flash it'],
    });

    expect(text.split('\n')).toEqual([
      '✅ Signed firmware: fw_signed.bin (36 bytes)',
      '',
      '  • Firmware size: 4 bytes',
      '',
      '💡 Suggestions:',
      '  • Flash it',
    ]);
  });

  it('marks errors and lists warnings', () => {
    const text = formatOutput({ message: 'Bad', warnings: ['Careful'] }, true);

    expect(text.split('\n')).toEqual(['❌ Bad', '', '⚠️  Warnings:', '  • Careful']);
  });

  it('never renders data', () => {
    expect(formatOutput({ message: 'Generated signing key', data: 'test-key' })).toBe('✅ Generated signing key');
  });
});

describe('formatResult', () => {
  it('is empty for a success without output', () => {
    expect(formatResult(success())).toBe('');
  });

  it('formats failures as errors', () => {
    expect(formatResult(failure('Failed to read file: Not found: fw.bin'))).toBe(
      '❌ Failed to read file: Not found: fw.bin'
    );
  });
});

describe('printResult', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('puts data alone on stdout and decoration on stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    printResult(success({ message: 'Generated signing key', data: 'test-key' }));

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('test-key');
    expect(error).toHaveBeenCalledWith('✅ Generated signing key');
  });

  it('prints failures to stderr only', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    printResult(failure('Signature verification failed'));

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('❌ Signature verification failed');
  });

  it('prints plain successes to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    printResult(success({ message: 'Signature verified' }));

    expect(log).toHaveBeenCalledWith('✅ Signature verified');
    expect(error).not.toHaveBeenCalled();
  });
});

describe('toNumericExitCode', () => {
  it('follows Unix conventions', () => {
    expect(toNumericExitCode({ kind: 'success' })).toBe(0);
    expect(toNumericExitCode({ kind: 'general_error' })).toBe(1);
    expect(toNumericExitCode({ kind: 'misuse' })).toBe(2);
  });
});
