/**
 * @fileoverview Tests for the process-wide default bridge and its free
 * functions. A test provider is registered globally so the default bridge,
 * which resolves its tracer per call, records into memory.
 * @module tests/tracing/defaults.test
 */
import { ROOT_CONTEXT, trace } from '@opentelemetry/api';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createSignature } from '../../src/tasks/signature.js';
import { createChain, createChord, createGroup } from '../../src/tasks/workflow.js';
import {
  annotateSpanWithChainInfo,
  annotateSpanWithChordInfo,
  annotateSpanWithGroupInfo,
  annotateSpanWithSignatureInfo,
  constructContextFromHeaders,
  createContextBridge,
  defaultContextBridge,
  headersWithContext,
  startSpanFromHeaders,
} from '../../src/tracing/defaults.js';
import { createTestTracing, SPAN_ID, TRACE_ID, TRACEPARENT } from './helpers.js';

const tracing = createTestTracing();

beforeAll(() => {
  trace.setGlobalTracerProvider(tracing.provider);
});

afterAll(() => {
  trace.disable();
});

describe('default bridge', () => {
  it('picks up the global provider registered after it was built', () => {
    const { span } = startSpanFromHeaders({ traceparent: TRACEPARENT }, 'process');
    span.end();

    const finished = tracing.finishedSpans().find((s) => s.name === 'process');
    expect(finished?.spanContext().traceId).toBe(TRACE_ID);
    expect(finished?.parentSpanContext?.spanId).toBe(SPAN_ID);
  });

  it('decodes and encodes headers', () => {
    const ctx = constructContextFromHeaders({ traceparent: TRACEPARENT });
    expect(headersWithContext(undefined, ctx)).toEqual({
      traceparent: TRACEPARENT,
    });
  });

  it('annotates through the free functions', () => {
    const span = defaultContextBridge.getTracer().startSpan('SendChord');
    const ctx = trace.setSpan(ROOT_CONTEXT, span);
    const signature = createSignature({ uuid: 't1', name: 'resize' });
    const chain = createChain(createSignature({ uuid: 'c1', name: 'fetch' }));
    const group = createGroup(createSignature({ uuid: 'g1', name: 'thumb' }));
    const chord = createChord(
      createGroup(createSignature({ uuid: 'm1', name: 'thumb' })),
      createSignature({ uuid: 'cb-1', name: 'collect' }),
    );

    annotateSpanWithSignatureInfo(ctx, signature);
    annotateSpanWithChainInfo(ctx, chain);
    annotateSpanWithGroupInfo(ctx, group, 3);
    annotateSpanWithChordInfo(ctx, chord, 3);
    span.end();

    const finished = tracing.finishedSpans().find((s) => s.name === 'SendChord');
    expect(finished?.attributes).toMatchObject({
      'signature.name': 'resize',
      'signature.uuid': 't1',
      'chain.tasks.length': 1,
      'group.uuid': chord.group.groupUUID,
      'group.tasks': '["m1"]',
      'group.concurrency': 3,
      'chord.callback.uuid': 'cb-1',
    });
    const { traceId, spanId } = span.spanContext();
    expect(chord.callback.headers).toEqual({
      traceparent: `00-${traceId}-${spanId}-01`,
    });
    expect(chain.tasks[0]?.headers).toEqual(chord.callback.headers);
  });
});

describe('createContextBridge', () => {
  it('builds a bridge on the given provider', () => {
    const isolated = createTestTracing();
    const bridge = createContextBridge({ tracerProvider: isolated.provider });

    bridge.startSpanFromHeaders({}, 'isolated').span.end();

    expect(isolated.finishedSpans().map((s) => s.name)).toEqual(['isolated']);
    expect(
      tracing.finishedSpans().some((s) => s.name === 'isolated'),
    ).toBe(false);
  });
});
