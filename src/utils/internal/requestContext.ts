/**
 * @fileoverview Utilities for creating and managing request contexts.
 * A request context is the structured payload attached to every log line:
 * a unique id, a timestamp, the operation name and, when a span is
 * available, the OpenTelemetry trace and span ids so logs and traces can be
 * joined.
 * @module src/utils/internal/requestContext
 */
import { trace, type Context, type Span } from '@opentelemetry/api';

import { generateRequestContextId } from '../security/idGenerator.js';

/**
 * Core structure for context information associated with an operation.
 */
export interface RequestContext {
  /** Unique id used for log correlation. */
  requestId: string;

  /** ISO 8601 timestamp of creation. */
  timestamp: string;

  /**
   * Arbitrary additional key-value pairs. Consumers must type-check when
   * reading extended properties.
   */
  [key: string]: unknown;
}

/**
 * Parameters for creating a new request context.
 */
export interface CreateRequestContextParams {
  /**
   * A parent context to inherit properties from, such as `requestId`.
   */
  parentContext?: Record<string, unknown> | RequestContext;

  /**
   * Key-value pairs merged into the new context, overriding inherited ones.
   */
  additionalContext?: Record<string, unknown>;

  /** A descriptive name for the operation creating this context. */
  operation?: string;

  /**
   * An OpenTelemetry context whose span supplies `traceId` and `spanId`.
   * When omitted the globally active span is used.
   */
  traceContext?: Context;
}

const KNOWN_PARAM_KEYS = new Set([
  'parentContext',
  'additionalContext',
  'operation',
  'traceContext',
]);

const asRecord = (value: unknown): Record<string, unknown> | undefined => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
};

const requestContextServiceInstance = {
  /**
   * Creates a new {@link RequestContext}. Accepts either
   * `CreateRequestContextParams` or a plain object whose properties are
   * copied into the context.
   *
   * Trace and span ids are added when a span is found on `traceContext` or,
   * failing that, on the active context.
   */
  createRequestContext(
    params: CreateRequestContextParams | Record<string, unknown> = {},
  ): RequestContext {
    const rest = Object.fromEntries(
      Object.entries(params).filter(([key]) => !KNOWN_PARAM_KEYS.has(key)),
    );
    const inheritedContext = asRecord(params.parentContext) ?? {};
    const additionalContext = asRecord(params.additionalContext) ?? {};
    const operation =
      typeof params.operation === 'string' ? params.operation : undefined;

    const requestId =
      typeof inheritedContext.requestId === 'string' &&
      inheritedContext.requestId
        ? inheritedContext.requestId
        : generateRequestContextId();

    const context: RequestContext = {
      ...inheritedContext,
      ...rest,
      requestId,
      timestamp: new Date().toISOString(),
      ...additionalContext,
      ...(operation ? { operation } : {}),
    };

    // --- OpenTelemetry Integration ---
    const span: Span | undefined = isOtelContext(params.traceContext)
      ? trace.getSpan(params.traceContext)
      : trace.getActiveSpan();
    if (span && typeof span.spanContext === 'function') {
      const spanContext = span.spanContext();
      context.traceId = spanContext.traceId;
      context.spanId = spanContext.spanId;
    }
    // --- End OpenTelemetry Integration ---

    return context;
  },
};

function isOtelContext(value: unknown): value is Context {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getValue' in value &&
    typeof value.getValue === 'function'
  );
}

/**
 * Primary export for request context functionality.
 */
export const requestContextService = requestContextServiceInstance;
