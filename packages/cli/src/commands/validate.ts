/**
 * epcqr iban <value> / epcqr rf <value> commands
 */

import { formatIban, isValidIban, isValidRfReference } from '@epcqr/checksum';
import type { Logger } from 'pino';
import type { CommandResult, IdentifierKind, ValidateData } from '../types.js';
import { timing } from '../utils.js';

const CHECKS: Record<IdentifierKind, (value: string) => boolean> = {
  iban: isValidIban,
  rf: isValidRfReference,
};

export class ValidateCommand {
  constructor(
    private readonly kind: IdentifierKind,
    private readonly logger: Logger
  ) {}

  execute(value: string): CommandResult<ValidateData> {
    const timer = timing();
    const valid = CHECKS[this.kind](value);

    // The value is logged under its own key so IBANs fall under redaction
    this.logger.debug({ [this.kind]: value, valid }, 'identifier checked');

    const data: ValidateData = { kind: this.kind, value, valid };
    if (valid && this.kind === 'iban') {
      data.formatted = formatIban(value);
    }

    return {
      success: true,
      data,
      timing: timer.end(),
    };
  }
}
