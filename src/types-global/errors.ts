/**
 * @fileoverview Defines standardized error codes and the custom error class
 * used across the bridge, its task model and the ambient services (config,
 * logging, telemetry bootstrap).
 * @module src/types-global/errors
 */

/**
 * Failure categories of the bridge. `ErrorHandler` picks one for every
 * handled error and logs it as `errorCode`; tasks that fail under a dispatch
 * span surface it on the rethrown {@link BridgeError}.
 */
export enum BridgeErrorCode {
  InternalError = -32603,

  ServiceUnavailable = -32000,
  NotFound = -32001,
  Conflict = -32002,
  RateLimited = -32003,
  Timeout = -32004,
  Forbidden = -32005,
  Unauthorized = -32006,
  ValidationError = -32007,
  ConfigurationError = -32008,
  SerializationError = -32070,
}

/**
 * Error carrying a {@link BridgeErrorCode} and optional structured data.
 */
export class BridgeError extends Error {
  /**
   * The standardized error code from {@link BridgeErrorCode}.
   */
  public code: BridgeErrorCode;

  /**
   * Optional structured data that helps in understanding the failure.
   */
  public readonly data?: Record<string, unknown>;

  constructor(
    code: BridgeErrorCode,
    message?: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);

    this.code = code;
    if (data) {
      this.data = data;
    }
    this.name = 'BridgeError';

    // Maintain a proper prototype chain.
    Object.setPrototypeOf(this, BridgeError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BridgeError);
    }
  }
}
