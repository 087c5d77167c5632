/**
 * @fileoverview Producer and consumer spans around task dispatch. A broker
 * integration wraps its publish calls in the `traceSend*` methods and its
 * task execution in {@link TaskDispatchTracer.traceProcessTask}; the bridge
 * does the header stamping and span annotation.
 *
 * Workflow sends hand their callback the context of the workflow span, so
 * the per-task sends made inside it become that span's children:
 *
 * ```ts
 * await dispatchTracer.traceSendGroup(ctx, group, 2, (groupCtx) =>
 *   Promise.all(
 *     group.tasks.map((task) =>
 *       dispatchTracer.traceSendTask(groupCtx, task, () => broker.publish(task)),
 *     ),
 *   ),
 * );
 * ```
 * @module src/tracing/dispatch
 */
import {
  context,
  SpanKind,
  trace,
  type Context,
  type Span,
} from '@opentelemetry/api';

import { config } from '../config/index.js';
import type { Chain, Chord, Group, Signature } from '../tasks/types.js';
import { ErrorHandler } from '../utils/internal/error-handler/index.js';
import { logger } from '../utils/internal/logger.js';
import { requestContextService } from '../utils/internal/requestContext.js';
import { ATTR_COMPONENT } from '../utils/telemetry/semconv.js';
import type { ContextBridge } from './contextBridge.js';
import { defaultContextBridge } from './defaults.js';

/**
 * Work run inside a dispatch span. Receives the context carrying that span.
 */
export type DispatchCallback<T> = (spanContext: Context) => Promise<T> | T;

export const SEND_TASK_SPAN = 'SendTask';
export const SEND_CHAIN_SPAN = 'SendChain';
export const SEND_GROUP_SPAN = 'SendGroup';
export const SEND_CHORD_SPAN = 'SendChord';

export class TaskDispatchTracer {
  constructor(
    private readonly bridge: ContextBridge = defaultContextBridge,
    private readonly component: string = config.tracing.spanComponent,
  ) {}

  /**
   * Publishes one task under a `SendTask` producer span. The task's headers
   * carry the span's context by the time `send` runs.
   */
  traceSendTask<T>(
    parent: Context,
    signature: Signature,
    send: DispatchCallback<T>,
  ): Promise<T> {
    const { span, spanContext } = this.startProducerSpan(
      SEND_TASK_SPAN,
      parent,
    );
    this.bridge.annotateSignature(spanContext, signature);
    signature.headers = this.bridge.headersWithContext(
      signature.headers,
      spanContext,
    );

    logger.debug(
      `Sending task ${signature.name}`,
      requestContextService.createRequestContext({
        operation: 'TaskDispatchTracer.traceSendTask',
        traceContext: spanContext,
        additionalContext: { taskUUID: signature.uuid },
      }),
    );

    return this.run(
      'TaskDispatchTracer.traceSendTask',
      span,
      spanContext,
      describeSignature(signature),
      send,
    );
  }

  traceSendChain<T>(
    parent: Context,
    chain: Chain,
    send: DispatchCallback<T>,
  ): Promise<T> {
    const { span, spanContext } = this.startProducerSpan(
      SEND_CHAIN_SPAN,
      parent,
    );
    this.bridge.annotateChain(spanContext, chain);

    return this.run(
      'TaskDispatchTracer.traceSendChain',
      span,
      spanContext,
      { tasks: chain.tasks.map(describeSignature) },
      send,
    );
  }

  traceSendGroup<T>(
    parent: Context,
    group: Group,
    concurrency: number,
    send: DispatchCallback<T>,
  ): Promise<T> {
    const { span, spanContext } = this.startProducerSpan(
      SEND_GROUP_SPAN,
      parent,
    );
    this.bridge.annotateGroup(spanContext, group, concurrency);

    return this.run(
      'TaskDispatchTracer.traceSendGroup',
      span,
      spanContext,
      { groupUUID: group.groupUUID, concurrency },
      send,
    );
  }

  traceSendChord<T>(
    parent: Context,
    chord: Chord,
    concurrency: number,
    send: DispatchCallback<T>,
  ): Promise<T> {
    const { span, spanContext } = this.startProducerSpan(
      SEND_CHORD_SPAN,
      parent,
    );
    this.bridge.annotateChord(spanContext, chord, concurrency);

    return this.run(
      'TaskDispatchTracer.traceSendChord',
      span,
      spanContext,
      {
        groupUUID: chord.group.groupUUID,
        callback: describeSignature(chord.callback),
        concurrency,
      },
      send,
    );
  }

  /**
   * Runs a received task under a consumer span named after it, continuing
   * the trace found in the task's headers.
   */
  traceProcessTask<T>(
    signature: Signature,
    process: DispatchCallback<T>,
  ): Promise<T> {
    const { span, context: spanContext } = this.bridge.startSpanFromHeaders(
      signature.headers,
      signature.name,
      {
        kind: SpanKind.CONSUMER,
        attributes: { [ATTR_COMPONENT]: this.component },
      },
    );
    this.bridge.annotateSignature(spanContext, signature);

    return this.run(
      'TaskDispatchTracer.traceProcessTask',
      span,
      spanContext,
      describeSignature(signature),
      process,
    );
  }

  private startProducerSpan(
    name: string,
    parent: Context,
  ): { span: Span; spanContext: Context } {
    const span = this.bridge.getTracer().startSpan(
      name,
      {
        kind: SpanKind.PRODUCER,
        attributes: { [ATTR_COMPONENT]: this.component },
      },
      parent,
    );
    return { span, spanContext: trace.setSpan(parent, span) };
  }

  private async run<T>(
    operation: string,
    span: Span,
    spanContext: Context,
    input: unknown,
    fn: DispatchCallback<T>,
  ): Promise<T> {
    try {
      return await ErrorHandler.tryCatch(
        () => context.with(spanContext, () => fn(spanContext)),
        {
          operation,
          span,
          input,
          context: requestContextService.createRequestContext({
            operation,
            traceContext: spanContext,
          }),
        },
      );
    } finally {
      span.end();
    }
  }
}

function describeSignature(signature: Signature): Record<string, unknown> {
  return {
    uuid: signature.uuid,
    name: signature.name,
    headers: signature.headers,
  };
}
