/**
 * Environment configuration for the CLI
 *
 * Every value has a default, so an empty environment is a working one.
 * Unrecognised values fall back to the default.
 */

import {
  CHARACTER_SETS,
  IDENTIFICATIONS,
  VERSIONS,
  type CharacterSet,
  type Identification,
  type Version,
} from '@epcqr/schema';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliConfig {
  logLevel: LogLevel;
  /** Redact IBAN and BIC values in log lines */
  redact: boolean;
  defaults: {
    version: Version;
    characterSet: CharacterSet;
    identification: Identification;
  };
}

type Env = Record<string, string | undefined>;

function bool(v: string | undefined, d = false): boolean {
  return v === 'true' ? true : v === 'false' ? false : d;
}

function oneOf<T extends string>(v: string | undefined, allowed: readonly T[], d: T): T {
  return allowed.find((candidate) => candidate === v) ?? d;
}

export function loadConfig(env: Env = process.env): CliConfig {
  return {
    logLevel: oneOf(env.LOG_LEVEL, LOG_LEVELS, 'warn'),
    redact: bool(env.EPCQR_REDACT, true),
    defaults: {
      version: oneOf(env.EPCQR_VERSION, VERSIONS, 'V2'),
      characterSet: oneOf(env.EPCQR_CHARACTER_SET, CHARACTER_SETS, 'UTF8'),
      identification: oneOf(env.EPCQR_IDENTIFICATION, IDENTIFICATIONS, 'SCT'),
    },
  };
}
