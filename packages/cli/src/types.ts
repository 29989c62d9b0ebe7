/**
 * Types for the epcqr CLI
 */

import type { PayloadErrorKind } from '@epcqr/schema';

export interface CLIOptions {
  verbose?: boolean;
  json?: boolean;
}

export interface CommandResult<T = CommandData> {
  success: boolean;
  data?: T;
  error?: string;
  /** Registry code when the failure is a payload rule */
  code?: string;
  timing?: {
    started: number;
    completed: number;
    duration: number;
  };
}

export interface BuildData {
  payload: string;
  lines: string[];
}

export interface BuildFailureData {
  kind: PayloadErrorKind;
  field: string;
}

export type IdentifierKind = 'iban' | 'rf';

export interface ValidateData {
  kind: IdentifierKind;
  value: string;
  valid: boolean;
  /** Grouped form of a valid IBAN */
  formatted?: string;
}

export type CommandData = BuildData | BuildFailureData | ValidateData;
