/**
 * @fileoverview Span lookup and attribute helpers shared by the bridge's
 * annotation methods.
 * @module src/tracing/spanAnnotator
 */
import {
  INVALID_SPAN_CONTEXT,
  trace,
  type Context,
  type Span,
} from '@opentelemetry/api';

import { logger } from '../utils/internal/logger.js';
import { requestContextService } from '../utils/internal/requestContext.js';
import { ATTR_GROUP_TASKS } from '../utils/telemetry/semconv.js';

/**
 * The span active on `context`, or a non-recording span when there is none.
 * Attribute writes on the latter are dropped.
 */
export function spanFromContext(context: Context): Span {
  return trace.getSpan(context) ?? trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
}

/**
 * Sets `group.tasks` to the JSON encoding of `uuids`. When encoding fails
 * the attribute is written as a string array instead; the failure is only
 * logged.
 */
export function setGroupTasksAttribute(
  span: Span,
  uuids: readonly string[],
  encode: (value: readonly string[]) => string = JSON.stringify,
): void {
  let encoded: string;
  try {
    encoded = encode(uuids);
  } catch (error) {
    logger.debug(
      'Could not encode group task UUIDs; recording them as a list.',
      requestContextService.createRequestContext({
        operation: 'SpanAnnotator.setGroupTasksAttribute',
        additionalContext: {
          taskCount: uuids.length,
          errorMessage: error instanceof Error ? error.message : String(error),
        },
      }),
    );
    span.setAttribute(ATTR_GROUP_TASKS, [...uuids]);
    return;
  }
  span.setAttribute(ATTR_GROUP_TASKS, encoded);
}
