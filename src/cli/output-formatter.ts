/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

/**
 * Format a CliOutput's human-readable part (everything except `data`).
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  if (isError) {
    lines.push(chalk.red(`❌ ${output.message}`));
  } else {
    lines.push(chalk.green(`✅ ${output.message}`));
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

/**
 * Print a CliResult.
 *
 * When a result carries `data`, stdout gets only that value and the
 * decoration goes to stderr, so `KEY=$(firmseal keygen)` captures the key alone.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);

  if (result.kind === 'failure') {
    console.error(formatted);
    return;
  }

  const data = result.output?.data;
  if (data !== undefined) {
    console.log(data);
    if (formatted) console.error(formatted);
    return;
  }

  if (formatted) console.log(formatted);
}
