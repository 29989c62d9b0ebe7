/**
 * @epcqr/schema
 *
 * EPC QR payload model: validating builder, line formatter and error
 * registry. The text produced here is what a QR encoder embeds to prefill
 * a SEPA credit transfer.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { PayloadBuilder, remittanceText } from '@epcqr/schema';
 *
 * const result = new PayloadBuilder()
 *   .version('V2')
 *   .characterSet('UTF8')
 *   .identification('SCT')
 *   .beneficiary('Example Charity')
 *   .iban('DE90 8306 5408 0004 1042 42')
 *   .amount('10.00')
 *   .remittance(remittanceText('Donation'))
 *   .build();
 *
 * if (result.ok) {
 *   qrEncoder.encode(result.payload.toString());
 * }
 * ```
 */

// Constants and types
export * from './constants.js';
export type * from './types.js';
export * from './fields.js';

// Errors
export * from './errors.js';

// Payload (type only, instances come from PayloadBuilder)
export type { EpcPayload } from './payload.js';

// Builder and formatter
export { PayloadBuilder } from './builder.js';
export type { BuildResult, BuildSuccess, BuildFailure } from './builder.js';
export { LINE_SEPARATOR, formatPayload, payloadLines } from './formatter.js';

// Validators
export {
  AMOUNT_PATTERN,
  PURPOSE_CODE_PATTERN,
  AmountSchema,
  PurposeCodeSchema,
  IbanSchema,
  RfReferenceSchema,
  RemittanceTextSchema,
  PaymentInputSchema,
  isValidAmount,
  isValidPurpose,
  isValidRemittanceText,
} from './validators.js';
export type { PaymentInput } from './validators.js';

// Checksums, re-exported for standalone use
export { isValidIban, isValidRfReference } from '@epcqr/checksum';
