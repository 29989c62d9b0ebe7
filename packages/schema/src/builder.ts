/**
 * Payload Builder
 *
 * Collects field values in any order, then validates everything in one
 * pass. Rules are evaluated in a fixed order and the first failure is
 * reported:
 *
 * 1. version present
 * 2. character set present
 * 3. identification present
 * 4. BIC present, unless version is V2
 * 5. beneficiary present and non-empty
 * 6. IBAN present, then IBAN checksum
 * 7. amount grammar (if set)
 * 8. purpose code (if set)
 * 9. remittance: RF reference checksum, or text length (if set)
 */

import { isValidIban, isValidRfReference } from '@epcqr/checksum';
import {
  PayloadBuildError,
  PaymentInputError,
  createPayloadError,
  type PayloadError,
  type PayloadErrorKind,
} from './errors.js';
import { EpcPayload } from './payload.js';
import type {
  CharacterSet,
  Identification,
  Purpose,
  Remittance,
  Version,
} from './types.js';
import {
  PaymentInputSchema,
  isValidAmount,
  isValidPurpose,
  isValidRemittanceText,
  toPurpose,
  toRemittance,
} from './validators.js';

/**
 * Successful build result
 */
export interface BuildSuccess {
  ok: true;
  payload: EpcPayload;
}

/**
 * Failed build result
 */
export interface BuildFailure {
  ok: false;
  error: PayloadError;
}

export type BuildResult = BuildSuccess | BuildFailure;

interface PendingFields {
  version?: Version;
  characterSet?: CharacterSet;
  identification?: Identification;
  bic?: string;
  beneficiary?: string;
  iban?: string;
  amount?: string;
  purpose?: Purpose;
  remittance?: Remittance;
  information?: string;
}

const WHITESPACE = /\s/g;

function fail(kind: PayloadErrorKind): BuildFailure {
  return { ok: false, error: createPayloadError(kind) };
}

export class PayloadBuilder {
  private readonly fields: PendingFields = {};

  /**
   * Start a builder from raw input (parsed JSON or YAML, CLI flags)
   *
   * @throws PaymentInputError if the input does not have the shape of a payment
   */
  static fromInput(input: unknown): PayloadBuilder {
    const result = PaymentInputSchema.safeParse(input);
    if (!result.success) {
      throw new PaymentInputError(
        `Invalid payment input: ${result.error.issues.map((i) => i.message).join('; ')}`,
        result.error.issues
      );
    }

    const data = result.data;
    const builder = new PayloadBuilder();
    if (data.version !== undefined) builder.version(data.version);
    if (data.characterSet !== undefined) builder.characterSet(data.characterSet);
    if (data.identification !== undefined) builder.identification(data.identification);
    if (data.bic !== undefined) builder.bic(data.bic);
    if (data.beneficiary !== undefined) builder.beneficiary(data.beneficiary);
    if (data.iban !== undefined) builder.iban(data.iban);
    if (data.amount !== undefined) builder.amount(data.amount);
    if (data.purpose !== undefined) builder.purpose(toPurpose(data.purpose));
    const remittance = toRemittance(data);
    if (remittance !== undefined) builder.remittance(remittance);
    if (data.information !== undefined) builder.information(data.information);
    return builder;
  }

  version(version: Version): this {
    this.fields.version = version;
    return this;
  }

  characterSet(characterSet: CharacterSet): this {
    this.fields.characterSet = characterSet;
    return this;
  }

  identification(identification: Identification): this {
    this.fields.identification = identification;
    return this;
  }

  bic(bic: string): this {
    this.fields.bic = bic;
    return this;
  }

  beneficiary(beneficiary: string): this {
    this.fields.beneficiary = beneficiary;
    return this;
  }

  /**
   * Whitespace is removed here, so the stored IBAN is the electronic format
   */
  iban(iban: string): this {
    this.fields.iban = iban.replace(WHITESPACE, '');
    return this;
  }

  /**
   * @param amount - EUR amount as text, e.g. "10.00"; kept verbatim
   */
  amount(amount: string): this {
    this.fields.amount = amount;
    return this;
  }

  purpose(purpose: Purpose): this {
    this.fields.purpose = purpose;
    return this;
  }

  remittance(remittance: Remittance): this {
    this.fields.remittance = remittance;
    return this;
  }

  information(information: string): this {
    this.fields.information = information;
    return this;
  }

  /**
   * Validate all fields and create the payload.
   *
   * Never throws. The builder keeps its fields, so a failed build can be
   * corrected and retried.
   */
  build(): BuildResult {
    const {
      version,
      characterSet,
      identification,
      bic,
      beneficiary,
      iban,
      amount,
      purpose,
      remittance,
      information,
    } = this.fields;

    if (version === undefined) return fail('MissingVersion');
    if (characterSet === undefined) return fail('MissingCharacterSet');
    if (identification === undefined) return fail('MissingIdentification');
    if (bic === undefined && version !== 'V2') return fail('BicRequiredForVersion');
    if (beneficiary === undefined || beneficiary.length === 0) return fail('MissingBeneficiary');
    if (iban === undefined) return fail('MissingIban');
    if (!isValidIban(iban)) return fail('InvalidIban');
    if (amount !== undefined && !isValidAmount(amount)) return fail('InvalidAmount');
    if (purpose !== undefined && !isValidPurpose(purpose)) return fail('InvalidPurpose');

    if (remittance?.type === 'reference' && !isValidRfReference(remittance.reference)) {
      return fail('InvalidRemittanceReference');
    }
    if (remittance?.type === 'text' && !isValidRemittanceText(remittance.text)) {
      return fail('RemittanceTextTooLong');
    }

    return {
      ok: true,
      payload: new EpcPayload({
        version,
        characterSet,
        identification,
        bic,
        beneficiary,
        iban,
        amount,
        purpose,
        remittance,
        information,
      }),
    };
  }

  /**
   * Like build(), but throws on the first failed rule
   *
   * @throws PayloadBuildError
   */
  buildOrThrow(): EpcPayload {
    const result = this.build();
    if (!result.ok) {
      throw new PayloadBuildError(result.error);
    }
    return result.payload;
  }
}
