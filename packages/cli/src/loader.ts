/**
 * Payment document loader
 *
 * Reads raw payment input from YAML or JSON. The result is untyped; shape
 * checks happen in PayloadBuilder.fromInput.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as yaml from 'yaml';

export type DocumentFormat = 'yaml' | 'json';

export class PaymentLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PaymentLoadError';
  }
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse a payment document
 *
 * @param format - auto-detected if not provided: JSON first, then YAML
 * @throws PaymentLoadError on parse failure
 */
export function parsePaymentDocument(content: string, format?: DocumentFormat): unknown {
  try {
    if (format === 'json') {
      return JSON.parse(content);
    }
    if (format === 'yaml') {
      return yaml.parse(content);
    }
    try {
      return JSON.parse(content);
    } catch {
      return yaml.parse(content);
    }
  } catch (err) {
    throw new PaymentLoadError(
      `Failed to parse payment document: ${reason(err)}`,
      err instanceof Error ? err : undefined
    );
  }
}

export function formatFromPath(filePath: string): DocumentFormat | undefined {
  const ext = extname(filePath).toLowerCase();
  if (ext === '.json') return 'json';
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  return undefined;
}

/**
 * Load a payment document from a .json, .yaml or .yml file
 *
 * @throws PaymentLoadError on read or parse failure
 */
export async function loadPaymentFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new PaymentLoadError(
      `Failed to read payment file: ${filePath}`,
      err instanceof Error ? err : undefined
    );
  }
  return parsePaymentDocument(content, formatFromPath(filePath));
}
