#!/usr/bin/env node
/**
 * epcqr CLI entry point
 */

import { createProgram } from './program.js';
import { createExitHandler } from './utils.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    createExitHandler()(1);
  });
