/**
 * Query submission: POST {url}/query with { "query": text }.
 *
 * HTTP status is checked first. A success response whose `error` field is a
 * non-empty string still fails, with that string as the message; any `result`
 * sent alongside it is discarded.
 */

import { ServiceError, err, ok, type Result } from '../errors.js';
import { encodeJson } from '../json.js';
import { endpointUrl, expectShape, requestJson } from './http.js';
import type { QueryResult, RequestOptions, ServiceTarget } from './types.js';
import { validateQueryResponse } from './validate.js';

export async function submitQuery(
  target: ServiceTarget,
  query: string,
  options: RequestOptions = {},
): Promise<Result<QueryResult, ServiceError>> {
  const response = await requestJson('POST', target, 'query', { query }, options);
  if (!response.ok) return response;

  const url = endpointUrl(target.url, 'query');
  const decoded = expectShape(validateQueryResponse, response.value, url);
  if (!decoded.ok) return decoded;

  const { result, error } = decoded.value;
  if (error) {
    return err(new ServiceError(error, { url, body: encodeJson(decoded.value) }));
  }

  options.logger?.debug('http', 'query returned %s', result ? `${result.length} rows` : 'no result');
  return ok({ rows: result ?? null });
}
