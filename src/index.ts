/**
 * @fileoverview Public entry point: trace context propagation through task
 * queue headers, the task model it works on, and the supporting runtime.
 * @module src/index
 */

export * from './bootstrap.js';
export { config, parseConfig, type AppConfig } from './config/index.js';
export * from './tasks/index.js';
export * from './tracing/index.js';
export * from './types-global/errors.js';
export {
  ErrorHandler,
  logger,
  requestContextService,
  type LogLevel,
  type RequestContext,
} from './utils/internal/index.js';
export { sanitization, generateUUID } from './utils/security/index.js';
export * from './utils/telemetry/index.js';
