/**
 * EPC Payload
 *
 * Immutable result of PayloadBuilder.build(). Only the type is exported
 * from the package, so every instance has passed validation.
 */

import { SERVICE_TAG } from './constants.js';
import { formatPayload } from './formatter.js';
import type {
  CharacterSet,
  Identification,
  PayloadFields,
  Purpose,
  Remittance,
  ServiceTag,
  Version,
} from './types.js';

export type ValidatedFields = Omit<PayloadFields, 'serviceTag'>;

export class EpcPayload implements PayloadFields {
  readonly serviceTag: ServiceTag = SERVICE_TAG;
  readonly version: Version;
  readonly characterSet: CharacterSet;
  readonly identification: Identification;
  readonly bic?: string;
  readonly beneficiary: string;
  readonly iban: string;
  readonly amount?: string;
  readonly purpose?: Purpose;
  readonly remittance?: Remittance;
  readonly information?: string;

  /** @internal Use PayloadBuilder */
  constructor(fields: ValidatedFields) {
    this.version = fields.version;
    this.characterSet = fields.characterSet;
    this.identification = fields.identification;
    this.bic = fields.bic;
    this.beneficiary = fields.beneficiary;
    this.iban = fields.iban;
    this.amount = fields.amount;
    this.purpose = fields.purpose && Object.freeze({ ...fields.purpose });
    this.remittance = fields.remittance && Object.freeze({ ...fields.remittance });
    this.information = fields.information;
    Object.freeze(this);
  }

  toString(): string {
    return formatPayload(this);
  }
}
