/**
 * @fileoverview The context bridge: carries OpenTelemetry trace context
 * across the task queue boundary and describes task workflows on spans.
 *
 * Write path (before a task is published): {@link ContextBridge.headersWithContext}
 * stamps the current context into the task's headers; the `annotate*`
 * methods do the same for every member of a chain, group or chord and tag
 * the active span with the workflow's shape.
 *
 * Read path (when a worker picks a task up):
 * {@link ContextBridge.startSpanFromHeaders} continues the trace with a new
 * span; {@link ContextBridge.constructContextFromHeaders} only restores the
 * context.
 *
 * None of these methods throw. Bad input degrades to less tracing data.
 * @module src/tracing/contextBridge
 */
import {
  trace,
  type Context,
  type Span,
  type SpanOptions,
  type TextMapPropagator,
  type Tracer,
  type TracerProvider,
} from '@opentelemetry/api';

import type { Chain, Chord, Group, Headers, Signature } from '../tasks/types.js';
import { getGroupUUIDs } from '../tasks/workflow.js';
import {
  ATTR_CHAIN_TASKS_LENGTH,
  ATTR_CHORD_CALLBACK_UUID,
  ATTR_GROUP_CONCURRENCY,
  ATTR_GROUP_TASKS_LENGTH,
  ATTR_GROUP_UUID,
  ATTR_SIGNATURE_CHORD_CALLBACK_NAME,
  ATTR_SIGNATURE_CHORD_CALLBACK_UUID,
  ATTR_SIGNATURE_GROUP_UUID,
  ATTR_SIGNATURE_NAME,
  ATTR_SIGNATURE_UUID,
} from '../utils/telemetry/semconv.js';
import { toCarrier, fromCarrier, type Carrier } from './headerAdapter.js';
import { Propagator } from './propagator.js';
import { setGroupTasksAttribute, spanFromContext } from './spanAnnotator.js';

export interface ContextBridgeOptions {
  /** Codec for the carrier. Defaults to trace-context + baggage. */
  propagator?: TextMapPropagator;
  /** Source of the bridge's tracer. Defaults to the global provider. */
  tracerProvider?: TracerProvider;
  tracerName?: string;
  tracerVersion?: string;
}

/**
 * A started span together with the context that carries it.
 */
export interface SpanStart {
  context: Context;
  span: Span;
}

export class ContextBridge {
  private readonly propagator: Propagator;
  private readonly tracerProvider: TracerProvider | undefined;
  private readonly tracerName: string;
  private readonly tracerVersion: string | undefined;

  constructor(options: ContextBridgeOptions = {}) {
    this.propagator = new Propagator(options.propagator);
    this.tracerProvider = options.tracerProvider;
    this.tracerName = options.tracerName ?? '';
    this.tracerVersion = options.tracerVersion;
  }

  /**
   * The bridge's tracer. Resolved on every call so a global provider
   * registered after the bridge was built is still picked up.
   */
  getTracer(): Tracer {
    const provider = this.tracerProvider ?? trace.getTracerProvider();
    return provider.getTracer(this.tracerName, this.tracerVersion);
  }

  /**
   * Carrier keys the bridge writes into headers.
   */
  propagationFields(): string[] {
    return this.propagator.fields();
  }

  /**
   * Restores the context found in `headers` and starts `operationName` as
   * its child (a root span when the headers carry no trace). `headers` is
   * not modified.
   */
  startSpanFromHeaders(
    headers: Headers | null | undefined,
    operationName: string,
    options: SpanOptions = {},
  ): SpanStart {
    const parent = this.constructContextFromHeaders(headers);
    const span = this.getTracer().startSpan(operationName, options, parent);
    return { context: trace.setSpan(parent, span), span };
  }

  /**
   * Restores the context found in `headers` without starting a span.
   */
  constructContextFromHeaders(headers: Headers | null | undefined): Context {
    return this.propagator.extract(toCarrier(headers));
  }

  /**
   * Stamps `context` into `headers` and returns the headers to use from now
   * on, which is a new object when `headers` was absent.
   */
  headersWithContext(
    headers: Headers | null | undefined,
    context: Context,
  ): Headers {
    const carrier: Carrier = {};
    this.propagator.inject(context, carrier);
    return fromCarrier(carrier, headers);
  }

  annotateSignature(context: Context, signature: Signature): void {
    const span = spanFromContext(context);

    span.setAttribute(ATTR_SIGNATURE_NAME, signature.name);
    span.setAttribute(ATTR_SIGNATURE_UUID, signature.uuid);

    if (signature.groupUUID) {
      span.setAttribute(ATTR_SIGNATURE_GROUP_UUID, signature.groupUUID);
    }

    if (signature.chordCallback) {
      span.setAttribute(
        ATTR_SIGNATURE_CHORD_CALLBACK_UUID,
        signature.chordCallback.uuid,
      );
      span.setAttribute(
        ATTR_SIGNATURE_CHORD_CALLBACK_NAME,
        signature.chordCallback.name,
      );
    }
  }

  /**
   * Tags the span with the chain length and stamps every member with
   * `context` itself, not with a context derived from the previous member.
   */
  annotateChain(context: Context, chain: Chain): void {
    const span = spanFromContext(context);
    span.setAttribute(ATTR_CHAIN_TASKS_LENGTH, chain.tasks.length);

    this.stampAll(context, chain.tasks);
  }

  annotateGroup(context: Context, group: Group, concurrency: number): void {
    const span = spanFromContext(context);

    span.setAttribute(ATTR_GROUP_UUID, group.groupUUID);
    span.setAttribute(ATTR_GROUP_TASKS_LENGTH, group.tasks.length);
    span.setAttribute(ATTR_GROUP_CONCURRENCY, concurrency);
    setGroupTasksAttribute(span, getGroupUUIDs(group));

    this.stampAll(context, group.tasks);
  }

  /**
   * The callback and the group members all receive `context`, as siblings.
   */
  annotateChord(context: Context, chord: Chord, concurrency: number): void {
    const span = spanFromContext(context);
    span.setAttribute(ATTR_CHORD_CALLBACK_UUID, chord.callback.uuid);

    chord.callback.headers = this.headersWithContext(
      chord.callback.headers,
      context,
    );

    this.annotateGroup(context, chord.group, concurrency);
  }

  private stampAll(context: Context, signatures: readonly Signature[]): void {
    for (const signature of signatures) {
      signature.headers = this.headersWithContext(signature.headers, context);
    }
  }
}
