/**
 * One invocation, start to finish:
 *
 *   resolving -> probing -> (ping exit | submitting) -> formatting -> done
 *
 * The first failing stage ends the invocation; nothing is retried.
 * Ping-only and empty-query runs finish early but successfully.
 */

import type { Readable, Writable } from 'node:stream';
import type { Dispatcher } from 'undici';
import { probe } from './client/probe.js';
import { submitQuery } from './client/submit.js';
import type { RequestOptions } from './client/types.js';
import { ok, type ClientError, type Result } from './errors.js';
import { formatResult, type FormatSummary } from './format/write.js';
import { resolveConfig, verbosityFromFlags, type Environment, type RawInputs, type ResolvedConfig } from './input/config.js';
import { isBlankQuery } from './input/source.js';
import { createLogger, type LineWriter } from './log.js';

export type InvocationOutcome =
  | { kind: 'pinged'; config: ResolvedConfig }
  | { kind: 'empty-query'; config: ResolvedConfig }
  | { kind: 'written'; config: ResolvedConfig; summary: FormatSummary };

export interface InvocationIo {
  stdin: Readable;
  stdout: Writable;
  env: Environment;
  /** Receives log lines; defaults to stderr */
  writeLog?: LineWriter;
  dispatcher?: Dispatcher;
}

export async function runInvocation(
  inputs: RawInputs,
  io: InvocationIo,
): Promise<Result<InvocationOutcome, ClientError>> {
  const logger = createLogger(verbosityFromFlags(inputs), io.writeLog);

  logger.debug('run', 'resolving');
  const resolved = await resolveConfig(inputs, io.env, io.stdin, logger);
  if (!resolved.ok) return resolved;
  const config = resolved.value;

  const requestOptions: RequestOptions = {
    timeoutMs: config.timeoutMs,
    dispatcher: io.dispatcher,
    logger,
  };

  logger.debug('run', 'probing %s', config.target.url);
  const health = await probe(config.target, requestOptions);
  if (!health.ok) return health;

  if (config.pingOnly) {
    logger.info('Service is available.');
    const outcome: InvocationOutcome = { kind: 'pinged', config };
    return ok(outcome);
  }

  if (isBlankQuery(config.query)) {
    logger.info('No query given; nothing to do.');
    const outcome: InvocationOutcome = { kind: 'empty-query', config };
    return ok(outcome);
  }

  logger.debug('run', 'submitting %d characters', config.query.length);
  const submitted = await submitQuery(config.target, config.query, requestOptions);
  if (!submitted.ok) return submitted;

  logger.debug('run', 'formatting as %s', config.asCsv ? 'csv' : 'json');
  const written = await formatResult(config.sink, submitted.value, {
    separator: config.separator,
    asCsv: config.asCsv,
    stdout: io.stdout,
    logger,
  });
  if (!written.ok) return written;

  logger.debug('run', 'done');
  const outcome: InvocationOutcome = { kind: 'written', config, summary: written.value };
  return ok(outcome);
}
