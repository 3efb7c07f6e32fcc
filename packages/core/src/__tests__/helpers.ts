import { Readable, Writable } from 'node:stream';
import type { ClientError, Result } from '../errors.js';

export const BASE_URL = 'http://gabi.test';
export const TEST_TOKEN = 'test-token';
export const AUTH_HEADERS = { authorization: `Bearer ${TEST_TOKEN}` };

export interface MemoryStream {
  stream: Writable;
  text(): string;
}

export function memoryStream(): MemoryStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: unknown, _encoding, callback) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk.toString('utf-8') : String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export function emptyStdin(): Readable {
  return Readable.from([]);
}

/** A stdin that fails the moment anything reads it. */
export function untouchableStdin(): Readable {
  return new Readable({
    read() {
      this.destroy(new Error('stdin must not be read'));
    },
  });
}

export function expectOk<T, E extends ClientError>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.name}: ${result.error.message}`);
  }
  return result.value;
}

export function expectErr<T, E extends ClientError>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('expected failure, got success');
  }
  return result.error;
}
