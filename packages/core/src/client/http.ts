/**
 * Bearer-authenticated JSON exchange with the query service.
 * One request per call: no retries, bounded by a timeout.
 */

import { fetch } from 'undici';
import type { ValidateFunction } from 'ajv';
import { CLIENT_DEFAULTS } from '../defaults.js';
import { decodeJson, encodeJson } from '../json.js';
import { ServiceError, describeCause, err, ok, type Result } from '../errors.js';
import { silentLogger } from '../log.js';
import type { RequestOptions, ServiceTarget } from './types.js';
import { describeValidationErrors } from './validate.js';

export type HttpMethod = 'GET' | 'POST';

const SNIPPET_LENGTH = 200;

/** Join a base URL and a path, ignoring trailing slashes on the base. */
export function endpointUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path}`;
}

function snippet(text: string): string {
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}...` : text;
}

function transportError(url: string, timeoutMs: number, error: unknown): ServiceError {
  const reason =
    error instanceof Error && error.name === 'TimeoutError'
      ? `timed out after ${timeoutMs}ms`
      : describeCause(error);
  return new ServiceError(`Request to ${url} failed: ${reason}`, { url, cause: error });
}

/**
 * Send one request and decode a JSON body.
 * Non-2xx statuses become a ServiceError carrying status, reason and body verbatim.
 */
export async function requestJson(
  method: HttpMethod,
  target: ServiceTarget,
  path: string,
  payload: unknown,
  options: RequestOptions = {},
): Promise<Result<unknown, ServiceError>> {
  const logger = options.logger ?? silentLogger;
  const timeoutMs = options.timeoutMs ?? CLIENT_DEFAULTS.timeoutMs;
  const url = endpointUrl(target.url, path);

  const headers: Record<string, string> = {
    Authorization: `Bearer ${target.token}`,
    Accept: 'application/json',
  };
  let body: string | undefined;
  if (payload !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(payload);
  }

  logger.debug('http', '%s %s', method, url);

  let status: number;
  let statusText: string;
  let text: string;
  try {
    const response = await fetch(url, {
      method,
      headers,
      body,
      dispatcher: options.dispatcher,
      signal: AbortSignal.timeout(timeoutMs),
    });
    status = response.status;
    statusText = response.statusText;
    text = await response.text();
  } catch (error: unknown) {
    logger.debug('http', '%s %s failed: %s', method, url, describeCause(error));
    return err(transportError(url, timeoutMs, error));
  }

  logger.debug('http', '%s %s -> %d %s (%d bytes)', method, url, status, statusText, text.length);

  if (status < 200 || status > 299) {
    return err(ServiceError.fromResponse(url, status, statusText, text));
  }

  try {
    const decoded = decodeJson(text);
    return ok(decoded);
  } catch {
    return err(
      new ServiceError(`${url} returned a body that is not JSON: ${snippet(text)}`, {
        url,
        status,
        statusText,
        body: text,
      }),
    );
  }
}

/** Narrow a decoded body to the expected wire shape. */
export function expectShape<T>(
  validate: ValidateFunction<T>,
  value: unknown,
  url: string,
): Result<T, ServiceError> {
  if (validate(value)) {
    return ok(value);
  }
  return err(
    new ServiceError(`${url} returned an unexpected response: ${describeValidationErrors(validate)}`, {
      url,
      body: encodeJson(value),
    }),
  );
}
