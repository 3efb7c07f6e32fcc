/**
 * Argument resolution.
 *
 * Precedence: explicit flags, then environment (URL and token only). The
 * service URL and token must both be present before anything touches the
 * network; an absent query is not an error.
 */

import type { Readable } from 'node:stream';
import type { ServiceTarget } from '../client/types.js';
import { CLIENT_DEFAULTS } from '../defaults.js';
import { ConfigurationError, IOError, err, ok, type Result } from '../errors.js';
import { separatorProblem } from '../format/csv.js';
import type { SinkTarget } from '../format/sink.js';
import { silentLogger, type Logger, type Verbosity } from '../log.js';
import { describeSource, querySourceFromFlags, readQuerySource, type QuerySource } from './source.js';

export interface RawInputs {
  url?: string;
  token?: string;
  query?: string;
  queryFile?: string;
  output?: string;
  separator?: string;
  /** Defaults to true */
  csv?: boolean;
  ping?: boolean;
  debug?: boolean;
  quiet?: boolean;
  timeoutMs?: number;
}

export type Environment = Record<string, string | undefined>;

export interface ResolvedConfig {
  target: ServiceTarget;
  querySource: QuerySource;
  /** Empty when no query was given */
  query: string;
  sink: SinkTarget;
  separator: string;
  asCsv: boolean;
  pingOnly: boolean;
  verbosity: Verbosity;
  timeoutMs: number;
}

function present(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

export function verbosityFromFlags(flags: { debug?: boolean; quiet?: boolean }): Verbosity {
  if (flags.debug) return 'debug';
  if (flags.quiet) return 'quiet';
  return 'normal';
}

/** Checks that need no I/O. Returns the first problem found. */
export function validateInputs(inputs: RawInputs, env: Environment): Result<ServiceTarget, ConfigurationError> {
  const url = present(inputs.url) ?? present(env[CLIENT_DEFAULTS.urlEnv]);
  const token = present(inputs.token) ?? present(env[CLIENT_DEFAULTS.tokenEnv]);

  const missing: string[] = [];
  if (!url) missing.push(`service URL (--url or ${CLIENT_DEFAULTS.urlEnv})`);
  if (!token) missing.push(`token (--token or ${CLIENT_DEFAULTS.tokenEnv})`);
  if (!url || !token) {
    return err(new ConfigurationError(`Missing ${missing.join(' and ')}.`, missing));
  }

  const separatorIssue = separatorProblem(inputs.separator ?? CLIENT_DEFAULTS.separator);
  if (separatorIssue) {
    return err(new ConfigurationError(`Invalid --sep: ${separatorIssue}.`));
  }

  const timeoutMs = inputs.timeoutMs ?? CLIENT_DEFAULTS.timeoutMs;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    return err(new ConfigurationError('Invalid --timeout-ms: expected a positive integer.'));
  }

  return ok({ url, token });
}

export async function resolveConfig(
  inputs: RawInputs,
  env: Environment,
  stdin: Readable,
  logger: Logger = silentLogger,
): Promise<Result<ResolvedConfig, ConfigurationError | IOError>> {
  const target = validateInputs(inputs, env);
  if (!target.ok) return target;

  const pingOnly = Boolean(inputs.ping);
  const querySource = querySourceFromFlags(inputs);
  let query = '';
  // A ping never submits, so it never consumes stdin or reads the query file.
  if (!pingOnly) {
    logger.debug('input', 'reading query from %s', describeSource(querySource));
    const text = await readQuerySource(querySource, stdin);
    if (!text.ok) return text;
    query = text.value;
  }

  const sink: SinkTarget = inputs.output ? { kind: 'file', path: inputs.output } : { kind: 'stdout' };
  return ok({
    target: target.value,
    querySource,
    query,
    sink,
    separator: inputs.separator ?? CLIENT_DEFAULTS.separator,
    asCsv: inputs.csv ?? true,
    pingOnly,
    verbosity: verbosityFromFlags(inputs),
    timeoutMs: inputs.timeoutMs ?? CLIENT_DEFAULTS.timeoutMs,
  });
}
