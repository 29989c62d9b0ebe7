import pino, { type DestinationStream, type Logger } from 'pino';
import type { CliConfig } from './config.js';

/**
 * Account identifiers kept out of log lines unless redaction is turned off
 */
export const REDACT_PATHS = ['iban', 'bic', '*.iban', '*.bic'];

/**
 * Create the CLI logger
 *
 * Writes JSON lines to stderr by default so stdout carries only command
 * output.
 */
export function createLogger(
  config: Pick<CliConfig, 'logLevel' | 'redact'>,
  destination: DestinationStream = pino.destination(2)
): Logger {
  return pino(
    {
      name: 'epcqr',
      level: config.logLevel,
      formatters: {
        level: (label) => ({ level: label }),
      },
      redact: config.redact ? { paths: REDACT_PATHS, censor: '[REDACTED]' } : undefined,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    destination
  );
}
