/**
 * Wire types for the query service.
 *
 *   GET  {url}/healthcheck  -> { status: "OK" | other }
 *   POST {url}/query        -> { result: Row[] | null, error: string | null }
 */

import type { LosslessNumber } from 'lossless-json';
import type { Dispatcher } from 'undici';
import type { Logger } from '../log.js';

/** Decoded service JSON. Numbers from the wire keep their original text. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | LosslessNumber
  | JsonValue[]
  | { [key: string]: JsonValue };

/** One row of a result set; cells keep the order the service sent. */
export type Row = JsonValue[];

export interface HealthcheckResponse {
  status: string;
}

export interface QueryResponse {
  result?: Row[] | null;
  error?: string | null;
}

export interface QueryResult {
  /** Absent when the service returned `null` rows */
  rows: Row[] | null;
}

export interface ServiceTarget {
  /** Base URL; trailing slashes are ignored */
  url: string;
  /** Bearer token, sent verbatim */
  token: string;
}

export interface RequestOptions {
  timeoutMs?: number;
  /** Alternate undici dispatcher, e.g. a MockAgent */
  dispatcher?: Dispatcher;
  logger?: Logger;
}
