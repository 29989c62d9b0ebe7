/**
 * CLI utilities and formatting
 */

import chalk from 'chalk';
import type { CommandData, CommandResult, ValidateData } from './types.js';

export function formatOutput(result: CommandResult, json = false): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success) {
    const code = result.code ? ` [${result.code}]` : '';
    return chalk.red(`Error${code}: ${result.error ?? 'Unknown error'}`);
  }

  const data: CommandData | undefined = result.data;
  if (data === undefined) {
    return '';
  }
  if ('payload' in data) {
    // Plain text: this is what gets piped into a QR encoder
    return data.payload;
  }
  if ('valid' in data) {
    return formatValidateResult(data);
  }
  return JSON.stringify(data, null, 2);
}

/**
 * Text to write to stdout for a result
 *
 * A built payload is written as is, ending at the information line.
 * Everything else ends with a newline.
 */
export function renderOutput(result: CommandResult, json = false): string {
  const text = formatOutput(result, json);
  const data = result.data;
  if (!json && result.success && data !== undefined && 'payload' in data) {
    return text;
  }
  return `${text}\n`;
}

function formatValidateResult(data: ValidateData): string {
  const label = data.kind === 'iban' ? 'IBAN' : 'RF reference';
  if (!data.valid) {
    return chalk.red(`Invalid ${label}: ${data.value}`);
  }
  const lines = [chalk.green(`Valid ${label}`)];
  if (data.formatted) {
    lines.push(data.formatted);
  }
  return lines.join('\n');
}

/**
 * Exit code for a finished command
 */
export function exitCode(result: CommandResult): number {
  if (!result.success) {
    return 1;
  }
  const data = result.data;
  return data !== undefined && 'valid' in data && !data.valid ? 1 : 0;
}

export function createExitHandler() {
  return (code: number) => {
    process.exit(code);
  };
}

export function handleError(error: unknown): CommandResult<never> {
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}

export function timing() {
  const started = Date.now();
  return {
    started,
    end: () => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}
