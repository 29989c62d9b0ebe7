/**
 * @epcqr/cli - command line tools for EPC QR payloads
 * Provides build, iban and rf commands
 */

export { BuildCommand } from './commands/build.js';
export type { BuildFlags, BuildOptions } from './commands/build.js';
export { ValidateCommand } from './commands/validate.js';
export { LOG_LEVELS, loadConfig } from './config.js';
export type { CliConfig, LogLevel } from './config.js';
export { REDACT_PATHS, createLogger } from './logger.js';
export { PaymentLoadError, formatFromPath, loadPaymentFile, parsePaymentDocument } from './loader.js';
export type { DocumentFormat } from './loader.js';
export { createExitHandler, exitCode, formatOutput, handleError, renderOutput } from './utils.js';
export { createProgram, processIO } from './program.js';
export type { ProgramIO } from './program.js';
export type * from './types.js';
