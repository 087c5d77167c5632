/**
 * @fileoverview Shared error classification constants used by the error handler.
 * @module src/utils/internal/error-handler/mappings
 */
import { BridgeErrorCode } from '../../../types-global/errors.js';
import type { BaseErrorMapping } from './types.js';

/**
 * Maps standard JavaScript error constructor names to `BridgeErrorCode` values.
 */
export const ERROR_TYPE_MAPPINGS: Readonly<Record<string, BridgeErrorCode>> = {
  SyntaxError: BridgeErrorCode.ValidationError,
  TypeError: BridgeErrorCode.ValidationError,
  ReferenceError: BridgeErrorCode.InternalError,
  RangeError: BridgeErrorCode.ValidationError,
  URIError: BridgeErrorCode.ValidationError,
  EvalError: BridgeErrorCode.InternalError,
  AggregateError: BridgeErrorCode.InternalError,
  ZodError: BridgeErrorCode.ValidationError,
};

/**
 * Message/name patterns. Order matters: more specific patterns come first.
 */
export const COMMON_ERROR_PATTERNS: ReadonlyArray<Readonly<BaseErrorMapping>> =
  [
    {
      pattern:
        /auth|unauthorized|unauthenticated|invalid.*token|expired.*token/i,
      errorCode: BridgeErrorCode.Unauthorized,
    },
    {
      pattern: /permission|forbidden|access.*denied|not.*allowed/i,
      errorCode: BridgeErrorCode.Forbidden,
    },
    {
      pattern:
        /not found|no such|doesn't exist|couldn't find|task not registered/i,
      errorCode: BridgeErrorCode.NotFound,
    },
    {
      pattern:
        /invalid|validation|malformed|wrong format|missing required/i,
      errorCode: BridgeErrorCode.ValidationError,
    },
    {
      pattern: /conflict|already exists|duplicate/i,
      errorCode: BridgeErrorCode.Conflict,
    },
    {
      pattern: /rate limit|too many requests|throttled/i,
      errorCode: BridgeErrorCode.RateLimited,
    },
    {
      pattern: /timeout|timed out|deadline exceeded/i,
      errorCode: BridgeErrorCode.Timeout,
    },
    {
      pattern: /abort(ed)?|cancell?ed/i,
      errorCode: BridgeErrorCode.Timeout,
    },
    {
      pattern:
        /service unavailable|broker unavailable|connection refused|econnrefused/i,
      errorCode: BridgeErrorCode.ServiceUnavailable,
    },
    {
      pattern: /serializ|circular structure|json/i,
      errorCode: BridgeErrorCode.SerializationError,
    },
  ];
