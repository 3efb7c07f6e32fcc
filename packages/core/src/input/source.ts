/**
 * Where the query text comes from. Built once from flags, read once.
 */

import { readFile } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { IOError, describeCause, err, ok, type Result } from '../errors.js';

/** Passing this as the query reads it from standard input. */
export const STDIN_SENTINEL = '-';

export type QuerySource =
  | { kind: 'inline'; text: string }
  | { kind: 'file'; path: string }
  | { kind: 'stdin' }
  | { kind: 'none' };

/** A query file wins over the query argument. */
export function querySourceFromFlags(flags: { query?: string; queryFile?: string }): QuerySource {
  if (flags.queryFile) return { kind: 'file', path: flags.queryFile };
  if (flags.query === STDIN_SENTINEL) return { kind: 'stdin' };
  if (flags.query !== undefined) return { kind: 'inline', text: flags.query };
  return { kind: 'none' };
}

export function describeSource(source: QuerySource): string {
  switch (source.kind) {
    case 'inline':
      return 'command line';
    case 'file':
      return `file ${source.path}`;
    case 'stdin':
      return 'standard input';
    case 'none':
      return 'nowhere';
  }
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    const data: unknown = chunk;
    if (typeof data === 'string') {
      chunks.push(Buffer.from(data, 'utf-8'));
    } else if (data instanceof Uint8Array) {
      chunks.push(Buffer.from(data));
    }
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/** Bytes are decoded as UTF-8 here, at the point of reading. */
export async function readQuerySource(source: QuerySource, stdin: Readable): Promise<Result<string, IOError>> {
  switch (source.kind) {
    case 'inline':
      return ok(source.text);
    case 'none':
      return ok('');
    case 'file':
      try {
        return ok(await readFile(source.path, 'utf-8'));
      } catch (error: unknown) {
        return err(
          new IOError(`Cannot read query file ${source.path}: ${describeCause(error)}`, {
            path: source.path,
            cause: error,
          }),
        );
      }
    case 'stdin':
      try {
        return ok(await readStream(stdin));
      } catch (error: unknown) {
        return err(new IOError(`Cannot read query from standard input: ${describeCause(error)}`, { cause: error }));
      }
  }
}

export function isBlankQuery(text: string): boolean {
  return text.trim().length === 0;
}
