/**
 * Error taxonomy shared by every stage of an invocation.
 * Stages return a Result; nothing here is retried.
 */

export type ClientErrorKind = 'configuration' | 'service' | 'io';

export abstract class ClientError extends Error {
  abstract readonly kind: ClientErrorKind;
}

/** Required inputs missing after flags and environment were consulted. */
export class ConfigurationError extends ClientError {
  readonly kind = 'configuration' as const;
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

export interface ServiceErrorDetails {
  url?: string;
  status?: number;
  statusText?: string;
  body?: string;
  cause?: unknown;
}

/**
 * The service refused, failed, or answered with its own error channel.
 * `status` is absent when no HTTP response arrived at all.
 */
export class ServiceError extends ClientError {
  readonly kind = 'service' as const;
  readonly url?: string;
  readonly status?: number;
  readonly statusText?: string;
  readonly body?: string;

  constructor(message: string, details: ServiceErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'ServiceError';
    this.url = details.url;
    this.status = details.status;
    this.statusText = details.statusText;
    this.body = details.body;
  }

  static fromResponse(url: string, status: number, statusText: string, body: string): ServiceError {
    return new ServiceError(`HTTP ${status} ${statusText}: ${body}`, { url, status, statusText, body });
  }
}

export class IOError extends ClientError {
  readonly kind = 'io' as const;
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'IOError';
    this.path = options.path;
  }
}

export type Result<T, E extends ClientError = ClientError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends ClientError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const inner = cause.cause instanceof Error ? `: ${cause.cause.message}` : '';
    return `${cause.message}${inner}`;
  }
  return String(cause);
}
