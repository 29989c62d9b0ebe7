/**
 * epcqr build [file] command
 *
 * Field values come from three layers, later ones winning: configured
 * defaults, the payment document, then command line flags.
 */

import { PayloadBuilder, PaymentInputError, payloadLines } from '@epcqr/schema';
import type { Logger } from 'pino';
import type { CliConfig } from '../config.js';
import { loadPaymentFile } from '../loader.js';
import type { BuildData, BuildFailureData, CLIOptions, CommandResult } from '../types.js';
import { handleError, timing } from '../utils.js';

/**
 * Field flags as commander hands them over
 */
export interface BuildFlags {
  payloadVersion?: string;
  charset?: string;
  identification?: string;
  bic?: string;
  name?: string;
  iban?: string;
  amount?: string;
  purpose?: string;
  reference?: string;
  text?: string;
  info?: string;
}

export interface BuildOptions extends CLIOptions, BuildFlags {}

type RawInput = Record<string, unknown>;

function isRecord(value: unknown): value is RawInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flagsToInput(flags: BuildFlags): RawInput {
  const mapped: RawInput = {
    version: flags.payloadVersion,
    characterSet: flags.charset,
    identification: flags.identification,
    bic: flags.bic,
    beneficiary: flags.name,
    iban: flags.iban,
    amount: flags.amount,
    purpose: flags.purpose,
    reference: flags.reference,
    text: flags.text,
    information: flags.info,
  };
  return Object.fromEntries(Object.entries(mapped).filter(([, value]) => value !== undefined));
}

export class BuildCommand {
  constructor(
    private readonly config: CliConfig,
    private readonly logger: Logger
  ) {}

  async execute(
    file: string | undefined,
    options: BuildOptions = {}
  ): Promise<CommandResult<BuildData | BuildFailureData>> {
    const timer = timing();

    try {
      const document = file === undefined ? {} : await loadPaymentFile(file);
      if (!isRecord(document)) {
        return {
          success: false,
          error: 'Payment document must be a mapping of field names to values',
          timing: timer.end(),
        };
      }

      const input = this.mergeInput(document, flagsToInput(options));
      // A remittance flag replaces the document's remittance of either kind
      if (options.reference !== undefined) delete input.text;
      if (options.text !== undefined) delete input.reference;

      this.logger.debug({ file, iban: input.iban, bic: input.bic }, 'building payload');

      const result = PayloadBuilder.fromInput(input).build();
      if (!result.ok) {
        this.logger.warn({ code: result.error.code, field: result.error.field }, 'payload rejected');
        return {
          success: false,
          data: { kind: result.error.kind, field: result.error.field },
          error: result.error.message,
          code: result.error.code,
          timing: timer.end(),
        };
      }

      const payload = result.payload.toString();
      this.logger.info({ bytes: Buffer.byteLength(payload, 'utf-8') }, 'payload built');

      return {
        success: true,
        data: { payload, lines: payloadLines(result.payload) },
        timing: timer.end(),
      };
    } catch (error) {
      if (error instanceof PaymentInputError) {
        this.logger.warn({ issues: error.issues.length }, 'payment input rejected');
      }
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }

  private mergeInput(document: RawInput, flags: RawInput): RawInput {
    const { version, characterSet, identification } = this.config.defaults;
    return { version, characterSet, identification, ...document, ...flags };
  }
}
