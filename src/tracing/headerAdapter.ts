/**
 * @fileoverview Conversion between task headers (values of any type) and
 * the string-only carrier the propagator reads and writes.
 *
 * Decoding keeps string entries only; everything else is skipped without
 * error, since headers may legitimately hold non-string application data.
 * Encoding writes carrier entries over the existing headers and leaves every
 * other key alone.
 * @module src/tracing/headerAdapter
 */
import type { TextMapGetter, TextMapSetter } from '@opentelemetry/api';

import type { Headers } from '../tasks/types.js';

/**
 * Flat string-to-string transport envelope for a serialized trace context.
 */
export type Carrier = Record<string, string>;

export const carrierGetter: TextMapGetter<Carrier> = {
  keys(carrier) {
    return Object.keys(carrier);
  },
  get(carrier, key) {
    return Object.hasOwn(carrier, key) ? carrier[key] : undefined;
  },
};

export const carrierSetter: TextMapSetter<Carrier> = {
  set(carrier, key, value) {
    carrier[key] = value;
  },
};

/**
 * Copies the string-valued entries of `headers` into a new carrier.
 */
export function toCarrier(headers: Headers | null | undefined): Carrier {
  const carrier: Carrier = {};
  if (!headers) {
    return carrier;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      carrier[key] = value;
    }
  }
  return carrier;
}

/**
 * Writes every carrier entry into `headers`, overwriting existing values at
 * the same keys. A new headers object is allocated when `headers` is absent,
 * so callers must use the returned reference.
 */
export function fromCarrier(
  carrier: Carrier,
  headers: Headers | null | undefined,
): Headers {
  const target: Headers = headers ?? {};
  for (const [key, value] of Object.entries(carrier)) {
    target[key] = value;
  }
  return target;
}
