import type { Readable, Writable } from 'node:stream';
import type { Dispatcher } from 'undici';
import { ClientError, IOError, ServiceError, describeCause, type Environment } from '@gabi/core';
import { errorCode } from './errors.js';

/** Process streams and environment, swappable in tests. */
export interface CliIo {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  env: Environment;
  dispatcher?: Dispatcher;
}

export interface OutputOptions {
  /** Print status, body and cause under each error */
  debug: boolean;
}

export function processIo(): CliIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  };
}

export function printErrorLine(message: string, io: CliIo): void {
  io.stderr.write(`${message}\n`);
}

function errorDetails(error: unknown): string[] {
  const lines = [`Code: ${errorCode(error)}`];
  if (error instanceof ServiceError) {
    if (error.url) lines.push(`URL: ${error.url}`);
    if (error.status !== undefined) lines.push(`Status: ${error.status} ${error.statusText ?? ''}`.trimEnd());
    if (error.body !== undefined) lines.push(`Body: ${error.body}`);
    if (error.cause !== undefined) lines.push(`Cause: ${describeCause(error.cause)}`);
  } else if (error instanceof IOError) {
    if (error.path) lines.push(`Path: ${error.path}`);
    if (error.cause !== undefined) lines.push(`Cause: ${describeCause(error.cause)}`);
  } else if (!(error instanceof ClientError) && error instanceof Error && error.stack) {
    lines.push(error.stack);
  }
  return lines;
}

export function printError(error: unknown, output: OutputOptions, io: CliIo): void {
  const message = error instanceof Error ? error.message : String(error);
  printErrorLine(`Error: ${message}`, io);
  if (output.debug) {
    for (const line of errorDetails(error)) {
      printErrorLine(line, io);
    }
  }
}
