/**
 * @fileoverview Composite trace-context codec: W3C Trace Context
 * (`traceparent`, `tracestate`) for span identity plus W3C Baggage
 * (`baggage`) for cross-cutting key/value pairs. The two codecs own
 * disjoint carrier keys, so they run over one carrier in any order.
 * @module src/tracing/propagator
 */
import {
  ROOT_CONTEXT,
  type Context,
  type TextMapPropagator,
} from '@opentelemetry/api';
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from '@opentelemetry/core';

import { carrierGetter, carrierSetter, type Carrier } from './headerAdapter.js';

/**
 * Builds the trace-context + baggage composite used by default.
 */
export function createDefaultPropagator(): TextMapPropagator {
  return new CompositePropagator({
    propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
  });
}

/**
 * Carrier keys `textMapPropagator` owns. Header keys outside this list are
 * application data.
 */
export function propagationFields(
  textMapPropagator: TextMapPropagator = createDefaultPropagator(),
): string[] {
  return textMapPropagator.fields();
}

/**
 * Carrier-typed wrapper around an OpenTelemetry text-map propagator.
 */
export class Propagator {
  constructor(
    private readonly textMapPropagator: TextMapPropagator = createDefaultPropagator(),
  ) {}

  /**
   * Decodes identity and baggage from `carrier`. Missing or malformed keys
   * yield the root context.
   */
  extract(carrier: Carrier): Context {
    return this.textMapPropagator.extract(ROOT_CONTEXT, carrier, carrierGetter);
  }

  /**
   * Encodes `context` into `carrier`, writing only propagation keys.
   */
  inject(context: Context, carrier: Carrier): void {
    this.textMapPropagator.inject(context, carrier, carrierSetter);
  }

  /**
   * Carrier keys this propagator may write.
   */
  fields(): string[] {
    return this.textMapPropagator.fields();
  }
}
