/**
 * @fileoverview In-process tracer provider for tracing tests. Spans are
 * recorded in memory and never leave the process.
 * @module tests/tracing/helpers
 */
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type ReadableSpan,
} from '@opentelemetry/sdk-trace-base';

import { ContextBridge } from '../../src/tracing/contextBridge.js';

export interface TestTracing {
  provider: BasicTracerProvider;
  exporter: InMemorySpanExporter;
  bridge: ContextBridge;
  finishedSpans(): ReadableSpan[];
}

export function createTestTracing(): TestTracing {
  const exporter = new InMemorySpanExporter();
  const provider = new BasicTracerProvider({
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });
  const bridge = new ContextBridge({
    tracerProvider: provider,
    tracerName: 'bridge-test',
  });
  return {
    provider,
    exporter,
    bridge,
    finishedSpans: () => exporter.getFinishedSpans(),
  };
}

export const TRACE_ID = 'a1b2c3d4e5f60718293a4b5c6d7e8f90';
export const SPAN_ID = '1a2b3c4d5e6f7081';
export const TRACEPARENT = `00-${TRACE_ID}-${SPAN_ID}-01`;
