#!/usr/bin/env node
/**
 * lease-sync CLI
 *
 * Entry point for the `lease-sync` command.
 *
 * @module index
 */

import { createProgram } from './cli/program.js';
import { handleError } from './cli/utils.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    handleError(error);
    process.exitCode = 1;
  });
