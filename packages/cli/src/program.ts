/**
 * epcqr command tree
 * Commands: build, iban, rf
 */

import { Command } from 'commander';
import type { DestinationStream } from 'pino';
import { BuildCommand, type BuildFlags } from './commands/build.js';
import { ValidateCommand } from './commands/validate.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import type { CLIOptions, CommandResult, IdentifierKind } from './types.js';
import { createExitHandler, exitCode, renderOutput } from './utils.js';

type GlobalOptions = Pick<CLIOptions, 'json' | 'verbose'>;

/**
 * Where the program reads its environment and sends its output
 */
export interface ProgramIO {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  exit: (code: number) => void;
  /** Log sink, stderr when not given */
  logDestination?: DestinationStream;
}

export function processIO(): ProgramIO {
  return {
    env: process.env,
    stdout: (text) => {
      process.stdout.write(text);
    },
    exit: createExitHandler(),
  };
}

export function createProgram(io: ProgramIO = processIO()): Command {
  const program = new Command();
  const config = loadConfig(io.env);

  function loggerFor(options: GlobalOptions) {
    return createLogger(
      {
        redact: config.redact,
        logLevel: options.verbose ? 'debug' : config.logLevel,
      },
      io.logDestination
    );
  }

  function finish(result: CommandResult, json = false) {
    io.stdout(renderOutput(result, json));
    io.exit(exitCode(result));
  }

  program
    .name('epcqr')
    .description('Build EPC QR payloads and check IBANs and RF creditor references')
    .version('0.1.0');

  // Global options
  program.option('-j, --json', 'output in JSON format').option('-v, --verbose', 'debug logging on stderr');

  // epcqr build [payment.yaml]
  program
    .command('build [file]')
    .description('Build the payload text from a JSON or YAML payment file and/or flags')
    .option('--payload-version <version>', 'payload version: V1, V2, 001 or 002')
    .option('--charset <charset>', 'character set: UTF8 or 1')
    .option('--identification <identification>', 'SCT, INST or their wire codes')
    .option('--bic <bic>', 'beneficiary BIC (required for V1)')
    .option('--name <name>', 'beneficiary name')
    .option('--iban <iban>', 'beneficiary IBAN')
    .option('--amount <amount>', 'amount in euro, e.g. 12.50')
    .option('--purpose <code>', 'four letter purpose code')
    .option('--reference <reference>', 'RF creditor reference')
    .option('--text <text>', 'unstructured remittance text')
    .option('--info <information>', 'beneficiary to originator information')
    .action(async (file: string | undefined, options: BuildFlags) => {
      const globalOptions = program.opts<GlobalOptions>();
      const command = new BuildCommand(config, loggerFor(globalOptions));

      const result = await command.execute(file, { ...globalOptions, ...options });
      finish(result, globalOptions.json);
    });

  function validateAction(kind: IdentifierKind) {
    return (value: string) => {
      const globalOptions = program.opts<GlobalOptions>();
      const result = new ValidateCommand(kind, loggerFor(globalOptions)).execute(value);
      finish(result, globalOptions.json);
    };
  }

  // epcqr iban <value>
  program.command('iban <value>').description('Check an IBAN').action(validateAction('iban'));

  // epcqr rf <value>
  program
    .command('rf <value>')
    .description('Check an RF creditor reference')
    .action(validateAction('rf'));

  return program;
}
