/**
 * @fileoverview Tests for the context bridge entry points and span
 * annotation against an in-memory tracer provider.
 * @module tests/tracing/contextBridge.test
 */
import {
  propagation,
  ROOT_CONTEXT,
  SpanKind,
  trace,
  type Context,
  type Span,
} from '@opentelemetry/api';
import { W3CTraceContextPropagator } from '@opentelemetry/core';
import { beforeEach, describe, expect, it } from 'vitest';

import { createSignature } from '../../src/tasks/signature.js';
import type { Chord, Group, Signature } from '../../src/tasks/types.js';
import { ContextBridge } from '../../src/tracing/contextBridge.js';
import {
  createTestTracing,
  SPAN_ID,
  TRACE_ID,
  TRACEPARENT,
  type TestTracing,
} from './helpers.js';

function traceparentOf(span: Span): string {
  const { traceId, spanId } = span.spanContext();
  return `00-${traceId}-${spanId}-01`;
}

function task(uuid: string, name = 'resize'): Signature {
  return createSignature({ uuid, name });
}

describe('ContextBridge', () => {
  let tracing: TestTracing;
  let bridge: ContextBridge;

  beforeEach(() => {
    tracing = createTestTracing();
    bridge = tracing.bridge;
  });

  function startParent(name = 'parent'): { span: Span; ctx: Context } {
    const span = bridge.getTracer().startSpan(name, {}, ROOT_CONTEXT);
    return { span, ctx: trace.setSpan(ROOT_CONTEXT, span) };
  }

  describe('startSpanFromHeaders', () => {
    it('continues the trace found in the headers', () => {
      const headers = { traceparent: TRACEPARENT, attempt: 1 };

      const { span, context } = bridge.startSpanFromHeaders(headers, 'process');
      span.end();

      const [finished] = tracing.finishedSpans();
      expect(finished?.name).toBe('process');
      expect(finished?.spanContext().traceId).toBe(TRACE_ID);
      expect(finished?.parentSpanContext?.spanId).toBe(SPAN_ID);
      expect(trace.getSpan(context)).toBe(span);
    });

    it('starts a root span when the headers carry no trace', () => {
      const { span } = bridge.startSpanFromHeaders({}, 'process');
      span.end();

      const finished = tracing.finishedSpans();
      expect(finished).toHaveLength(1);
      expect(finished[0]?.name).toBe('process');
      expect(finished[0]?.parentSpanContext).toBeUndefined();
    });

    it('treats absent and malformed headers as no trace', () => {
      bridge.startSpanFromHeaders(undefined, 'a').span.end();
      bridge.startSpanFromHeaders({ traceparent: 'garbage' }, 'b').span.end();
      bridge.startSpanFromHeaders({ traceparent: 42 }, 'c').span.end();

      for (const finished of tracing.finishedSpans()) {
        expect(finished.parentSpanContext).toBeUndefined();
      }
      expect(tracing.finishedSpans()).toHaveLength(3);
    });

    it('does not modify the headers', () => {
      const headers = { traceparent: TRACEPARENT, tenant: 'acme' };
      bridge.startSpanFromHeaders(headers, 'process').span.end();
      expect(headers).toEqual({ traceparent: TRACEPARENT, tenant: 'acme' });
    });

    it('forwards span options to the tracer', () => {
      bridge
        .startSpanFromHeaders({}, 'process', {
          kind: SpanKind.CONSUMER,
          attributes: { queue: 'images' },
        })
        .span.end();

      const [finished] = tracing.finishedSpans();
      expect(finished?.kind).toBe(SpanKind.CONSUMER);
      expect(finished?.attributes).toEqual({ queue: 'images' });
    });

    it('restores baggage into the returned context', () => {
      const { context, span } = bridge.startSpanFromHeaders(
        { traceparent: TRACEPARENT, baggage: 'tenant=acme' },
        'process',
      );
      span.end();

      expect(
        propagation.getBaggage(context)?.getEntry('tenant')?.value,
      ).toBe('acme');
    });
  });

  describe('constructContextFromHeaders', () => {
    it('restores the remote span context without starting a span', () => {
      const ctx = bridge.constructContextFromHeaders({
        traceparent: TRACEPARENT,
      });

      expect(trace.getSpanContext(ctx)?.traceId).toBe(TRACE_ID);
      expect(trace.getSpanContext(ctx)?.spanId).toBe(SPAN_ID);
      expect(tracing.finishedSpans()).toHaveLength(0);
    });

    it('returns a context without a span for empty headers', () => {
      expect(trace.getSpan(bridge.constructContextFromHeaders({}))).toBeUndefined();
      expect(trace.getSpan(bridge.constructContextFromHeaders(null))).toBeUndefined();
    });
  });

  describe('headersWithContext', () => {
    it('returns exactly the propagation keys for absent headers', () => {
      const { span, ctx } = startParent();

      const headers = bridge.headersWithContext(undefined, ctx);

      expect(headers).toEqual({ traceparent: traceparentOf(span) });
    });

    it('stamps in place and keeps application keys', () => {
      const { span, ctx } = startParent();
      const headers = { tenant: 'acme', attempt: 2, traceparent: 'stale' };

      const result = bridge.headersWithContext(headers, ctx);

      expect(result).toBe(headers);
      expect(headers).toEqual({
        tenant: 'acme',
        attempt: 2,
        traceparent: traceparentOf(span),
      });
    });

    it('is idempotent', () => {
      const { ctx } = startParent();
      const once = bridge.headersWithContext({ tenant: 'acme' }, ctx);
      const twice = bridge.headersWithContext(
        bridge.headersWithContext({ tenant: 'acme' }, ctx),
        ctx,
      );
      expect(twice).toEqual(once);
    });

    it('writes nothing for a context without a span', () => {
      expect(bridge.headersWithContext(undefined, ROOT_CONTEXT)).toEqual({});
    });

    it('round-trips through startSpanFromHeaders', () => {
      const { span: producer, ctx } = startParent('SendTask');
      const headers = bridge.headersWithContext({}, ctx);
      producer.end();

      bridge.startSpanFromHeaders(headers, 'process').span.end();

      const consumer = tracing.finishedSpans().find((s) => s.name === 'process');
      expect(consumer?.spanContext().traceId).toBe(
        producer.spanContext().traceId,
      );
      expect(consumer?.parentSpanContext?.spanId).toBe(
        producer.spanContext().spanId,
      );
    });
  });

  describe('propagationFields', () => {
    it('lists the keys of the configured propagator', () => {
      expect(bridge.propagationFields()).toEqual([
        'traceparent',
        'tracestate',
        'baggage',
      ]);
      const traceOnly = new ContextBridge({
        propagator: new W3CTraceContextPropagator(),
      });
      expect(traceOnly.propagationFields()).toEqual([
        'traceparent',
        'tracestate',
      ]);
    });
  });

  describe('annotateSignature', () => {
    it('sets name and uuid for a plain task', () => {
      const { span, ctx } = startParent();

      bridge.annotateSignature(ctx, task('t1', 'resize'));
      span.end();

      expect(tracing.finishedSpans()[0]?.attributes).toEqual({
        'signature.name': 'resize',
        'signature.uuid': 't1',
      });
    });

    it('adds group and chord callback details when present', () => {
      const { span, ctx } = startParent();
      const signature = task('t1', 'resize');
      signature.groupUUID = 'g-1';
      signature.chordCallback = task('cb-1', 'collect');

      bridge.annotateSignature(ctx, signature);
      span.end();

      expect(tracing.finishedSpans()[0]?.attributes).toEqual({
        'signature.name': 'resize',
        'signature.uuid': 't1',
        'signature.group.uuid': 'g-1',
        'signature.chord.callback.uuid': 'cb-1',
        'signature.chord.callback.name': 'collect',
      });
    });

    it('does not touch the signature headers', () => {
      const { ctx } = startParent();
      const signature = task('t1');
      bridge.annotateSignature(ctx, signature);
      expect(signature.headers).toBeUndefined();
    });

    it('is a no-op for a context without a span', () => {
      expect(() =>
        bridge.annotateSignature(ROOT_CONTEXT, task('t1')),
      ).not.toThrow();
      expect(tracing.finishedSpans()).toHaveLength(0);
    });
  });

  describe('annotateChain', () => {
    it('sets the length and stamps every member with the same context', () => {
      const { span, ctx } = startParent('SendChain');
      const chain = { tasks: [task('t1'), task('t2'), task('t3')] };

      bridge.annotateChain(ctx, chain);
      span.end();

      expect(tracing.finishedSpans()[0]?.attributes).toEqual({
        'chain.tasks.length': 3,
      });
      for (const member of chain.tasks) {
        expect(member.headers).toEqual({ traceparent: traceparentOf(span) });
      }
    });

    it('handles an empty chain', () => {
      const { span, ctx } = startParent('SendChain');
      bridge.annotateChain(ctx, { tasks: [] });
      span.end();
      expect(tracing.finishedSpans()[0]?.attributes).toEqual({
        'chain.tasks.length': 0,
      });
    });
  });

  describe('annotateGroup', () => {
    it('records the group shape and member uuids', () => {
      const { span, ctx } = startParent('SendGroup');
      const group: Group = {
        groupUUID: 'g-1',
        tasks: [task('t1'), task('t2'), task('t3')],
      };

      bridge.annotateGroup(ctx, group, 2);
      span.end();

      expect(tracing.finishedSpans()[0]?.attributes).toEqual({
        'group.uuid': 'g-1',
        'group.tasks.length': 3,
        'group.concurrency': 2,
        'group.tasks': '["t1","t2","t3"]',
      });
    });

    it('gives every member the parent trace id', () => {
      const { span, ctx } = startParent('SendGroup');
      const group: Group = {
        groupUUID: 'g-1',
        tasks: [
          task('t1'),
          createSignature({ uuid: 't2', name: 'crop', headers: { tenant: 'acme' } }),
        ],
      };

      bridge.annotateGroup(ctx, group, 0);
      span.end();

      for (const member of group.tasks) {
        const restored = bridge.constructContextFromHeaders(member.headers);
        expect(trace.getSpanContext(restored)?.traceId).toBe(
          span.spanContext().traceId,
        );
      }
      expect(group.tasks[1]?.headers).toEqual({
        tenant: 'acme',
        traceparent: traceparentOf(span),
      });
    });

    it('records an empty list for an empty group', () => {
      const { span, ctx } = startParent('SendGroup');
      bridge.annotateGroup(ctx, { groupUUID: 'g-2', tasks: [] }, 1);
      span.end();
      expect(tracing.finishedSpans()[0]?.attributes['group.tasks']).toBe('[]');
    });
  });

  describe('annotateChord', () => {
    it('stamps the callback and every member as siblings', () => {
      const { span, ctx } = startParent('SendChord');
      const chord: Chord = {
        group: { groupUUID: 'g-1', tasks: [task('t1'), task('t2')] },
        callback: task('cb-1', 'collect'),
      };

      bridge.annotateChord(ctx, chord, 4);
      span.end();

      expect(tracing.finishedSpans()[0]?.attributes).toEqual({
        'chord.callback.uuid': 'cb-1',
        'group.uuid': 'g-1',
        'group.tasks.length': 2,
        'group.concurrency': 4,
        'group.tasks': '["t1","t2"]',
      });
      const expected = { traceparent: traceparentOf(span) };
      expect(chord.callback.headers).toEqual(expected);
      expect(chord.group.tasks[0]?.headers).toEqual(expected);
      expect(chord.group.tasks[1]?.headers).toEqual(expected);
    });
  });
});
