/**
 * Result formatting: quote-all delimited text or one JSON document.
 */

import type { Writable } from 'node:stream';
import type { QueryResult } from '../client/types.js';
import { IOError, describeCause, err, ok, type Result } from '../errors.js';
import { encodeJson } from '../json.js';
import { silentLogger, type Logger } from '../log.js';
import { formatCsvRow } from './csv.js';
import { openSink, type Sink, type SinkTarget } from './sink.js';

export interface FormatOptions {
  separator: string;
  /** false writes the rows as a JSON document */
  asCsv: boolean;
  stdout: Writable;
  logger?: Logger;
  /** Acquires the sink; defaults to openSink */
  openSink?: (target: SinkTarget, stdout: Writable) => Promise<Sink>;
}

export interface FormatSummary {
  rowsWritten: number;
  /** null when nothing was written anywhere */
  destination: string | null;
}

function toIOError(error: unknown): IOError {
  if (error instanceof IOError) return error;
  return new IOError(describeCause(error), { cause: error });
}

export function renderRows(result: QueryResult, separator: string, asCsv: boolean): string[] | null {
  if (result.rows === null) return null;
  if (!asCsv) return [encodeJson(result.rows)];
  return result.rows.map((row) => formatCsvRow(row, separator));
}

export async function formatResult(
  target: SinkTarget,
  result: QueryResult,
  options: FormatOptions,
): Promise<Result<FormatSummary, IOError>> {
  const logger = options.logger ?? silentLogger;
  const chunks = renderRows(result, options.separator, options.asCsv);
  if (chunks === null) {
    logger.info('Query returned no result set; nothing written.');
    return ok({ rowsWritten: 0, destination: null });
  }

  let sink: Sink;
  try {
    sink = await (options.openSink ?? openSink)(target, options.stdout);
  } catch (error: unknown) {
    return err(toIOError(error));
  }

  let failure: IOError | null = null;
  try {
    for (const chunk of chunks) {
      await sink.write(chunk);
    }
  } catch (error: unknown) {
    failure = toIOError(error);
  } finally {
    try {
      await sink.close();
    } catch (error: unknown) {
      failure ??= toIOError(error);
    }
  }
  if (failure) return err(failure);

  const rowsWritten = result.rows?.length ?? 0;
  logger.debug('run', 'wrote %d rows to %s', rowsWritten, sink.description);
  return ok({ rowsWritten, destination: sink.description });
}
