#!/usr/bin/env node

/**
 * gabi CLI entrypoint.
 */

import { EXIT_CODE_SERVICE } from './errors.js';
import { printError, processIo } from './output.js';
import { runCli } from './program.js';

async function main(): Promise<void> {
  const io = processIo();
  try {
    process.exitCode = await runCli(process.argv, io);
  } catch (error: unknown) {
    printError(error, { debug: true }, io);
    process.exitCode = EXIT_CODE_SERVICE;
  }
}

void main();
