/**
 * @fileoverview Types shared by the error handler.
 * @module src/utils/internal/error-handler/types
 */
import type { Span } from '@opentelemetry/api';

import type { BridgeErrorCode } from '../../../types-global/errors.js';

/**
 * Context attached to a handled error and its log line.
 */
export interface ErrorContext {
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Options for {@link ErrorHandler.handleError}.
 */
export interface ErrorHandlerOptions {
  /** Log context; `requestId` and `timestamp` are reused when present. */
  context?: ErrorContext;
  /** Name of the operation that failed, used in the message. */
  operation: string;
  /** The input that triggered the failure. Sanitized before logging. */
  input?: unknown;
  /** Span the failure is recorded on. Defaults to the active span. */
  span?: Span;
}

/**
 * Pattern-to-code rule used when classifying unknown errors.
 */
export interface BaseErrorMapping {
  pattern: string | RegExp;
  errorCode: BridgeErrorCode;
}

