/**
 * Quote-all delimited text.
 * Every cell is wrapped in double quotes and embedded quotes are doubled,
 * so any standard CSV reader gets the original cells back.
 */

import { isLosslessNumber } from 'lossless-json';
import type { JsonValue, Row } from '../client/types.js';
import { encodeJson } from '../json.js';

export const RECORD_DELIMITER = '\r\n';

const QUOTE = '"';

export function cellText(value: JsonValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (isLosslessNumber(value)) return value.value;
  return encodeJson(value);
}

export function quoteField(value: string): string {
  return `${QUOTE}${value.replaceAll(QUOTE, QUOTE + QUOTE)}${QUOTE}`;
}

export function formatCsvRow(row: Row, separator: string): string {
  return row.map((cell) => quoteField(cellText(cell))).join(separator) + RECORD_DELIMITER;
}

/**
 * A separator is usable when it is non-empty and cannot be confused with
 * quoting or record boundaries.
 */
export function separatorProblem(separator: string): string | null {
  if (separator.length === 0) return 'separator must not be empty';
  if (separator.includes(QUOTE)) return 'separator must not contain a double quote';
  if (/[\r\n]/.test(separator)) return 'separator must not contain a line break';
  return null;
}
