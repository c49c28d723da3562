#!/usr/bin/env node
/**
 * shrine CLI
 *
 * @example
 * ```bash
 * shrine init --git
 * shrine set db/password
 * shrine get db/password
 * shrine agent start --ttl 600 && shrine agent unlock
 * ```
 */

import { processEnvironment } from './context.js';
import { runCli } from './program.js';

runCli(process.argv.slice(2), processEnvironment())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
