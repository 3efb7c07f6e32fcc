/**
 * JSON codec for service bodies.
 * Numbers are decoded as LosslessNumber so 64-bit ids and `1.0` come back
 * out exactly as the service wrote them.
 */

import { parse, stringify } from 'lossless-json';

/** Throws SyntaxError on malformed input. */
export function decodeJson(text: string): unknown {
  return parse(text);
}

export function encodeJson(value: unknown): string {
  return stringify(value) ?? 'null';
}
