/**
 * @fileoverview Main ErrorHandler implementation with logging and telemetry integration.
 * @module src/utils/internal/error-handler/errorHandler
 */
import { SpanStatusCode, trace, type Span } from '@opentelemetry/api';

import {
  BridgeError,
  BridgeErrorCode,
} from '../../../types-global/errors.js';
import { generateUUID } from '../../security/idGenerator.js';
import { sanitizeInputForLogging } from '../../security/sanitization.js';
import { logger } from '../logger.js';
import type { RequestContext } from '../requestContext.js';
import { createSafeRegex, getErrorMessage, getErrorName } from './helpers.js';
import { COMMON_ERROR_PATTERNS, ERROR_TYPE_MAPPINGS } from './mappings.js';
import type { ErrorHandlerOptions } from './types.js';

/**
 * A utility class providing static methods for error handling.
 */
export class ErrorHandler {
  /**
   * Determines a `BridgeErrorCode` for a given error. Checks `BridgeError`
   * instances, then constructor names, then message patterns, and defaults
   * to `InternalError`.
   */
  public static determineErrorCode(error: unknown): BridgeErrorCode {
    if (error instanceof BridgeError) {
      return error.code;
    }

    const errorName = getErrorName(error);
    const errorMessage = getErrorMessage(error);

    const mappedFromType = ERROR_TYPE_MAPPINGS[errorName];
    if (mappedFromType) {
      return mappedFromType;
    }

    for (const mapping of COMMON_ERROR_PATTERNS) {
      const regex = createSafeRegex(mapping.pattern);
      if (regex.test(errorMessage) || regex.test(errorName)) {
        return mapping.errorCode;
      }
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return BridgeErrorCode.Timeout;
    }
    return BridgeErrorCode.InternalError;
  }

  /**
   * Records `error` on `span`: the exception event plus an ERROR status.
   * Defaults to the globally active span.
   */
  public static recordOnSpan(
    error: unknown,
    span: Span | undefined = trace.getActiveSpan(),
  ): void {
    if (!span) return;
    if (error instanceof Error) {
      span.recordException(error);
    }
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: getErrorMessage(error),
    });
  }

  /**
   * Records the error on `options.span` (or the active span), wraps it in a
   * `BridgeError` carrying the sanitized input and root cause, logs it and
   * returns the wrapped error.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): BridgeError {
    ErrorHandler.recordOnSpan(error, options.span);

    const { context = {}, operation, input } = options;

    const sanitizedInput =
      input !== undefined ? sanitizeInputForLogging(input) : undefined;
    const originalErrorName = getErrorName(error);
    const originalErrorMessage = getErrorMessage(error);
    const originalStack = error instanceof Error ? error.stack : undefined;

    const errorDataSeed =
      error instanceof BridgeError && error.data ? { ...error.data } : {};

    const consolidatedData: Record<string, unknown> = {
      ...errorDataSeed,
      ...context,
      originalErrorName,
      originalMessage: originalErrorMessage,
    };
    if (
      originalStack &&
      !(error instanceof BridgeError && error.data?.originalStack)
    ) {
      consolidatedData.originalStack = originalStack;
    }

    const cause = error instanceof Error ? error : undefined;
    const rootCause = ErrorHandler.findRootCause(cause);
    if (rootCause) {
      consolidatedData.rootCause = rootCause;
    }

    const errorCode = ErrorHandler.determineErrorCode(error);
    const finalError = new BridgeError(
      errorCode,
      error instanceof BridgeError
        ? error.message
        : `Error in ${operation}: ${originalErrorMessage}`,
      consolidatedData,
      { cause },
    );

    const logRequestId =
      typeof context.requestId === 'string' && context.requestId
        ? context.requestId
        : generateUUID();
    const logTimestamp =
      typeof context.timestamp === 'string' && context.timestamp
        ? context.timestamp
        : new Date().toISOString();

    const logContext: RequestContext = {
      ...Object.fromEntries(
        Object.entries(context).filter(
          ([key]) => key !== 'requestId' && key !== 'timestamp',
        ),
      ),
      requestId: logRequestId,
      timestamp: logTimestamp,
      operation,
      input: sanitizedInput,
      errorCode,
      originalErrorType: originalErrorName,
      errorData: consolidatedData,
      ...(originalStack ? { stack: originalStack } : {}),
    };

    logger.error(
      `Error in ${operation}: ${finalError.message || originalErrorMessage}`,
      logContext,
    );

    return finalError;
  }

  private static findRootCause(
    error: Error | undefined,
  ): { name: string; message: string } | undefined {
    let current: unknown = error;
    let depth = 0;
    while (current instanceof Error && current.cause && depth < 5) {
      current = current.cause;
      depth += 1;
    }
    return current instanceof Error
      ? { name: current.name, message: current.message }
      : undefined;
  }

  /**
   * Executes `fn` (sync or async) and routes any failure through
   * {@link ErrorHandler.handleError}. The handled error is always rethrown.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: ErrorHandlerOptions,
  ): Promise<T> {
    try {
      return await fn();
    } catch (caughtError) {
      throw ErrorHandler.handleError(caughtError, options);
    }
  }
}
