#!/usr/bin/env tsx

/**
 * lumen CLI - Lexical front end for the Lumen scripting language
 */

import { main } from './program.js';

process.exitCode = await main(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  cwd: process.cwd(),
  env: process.env,
});
