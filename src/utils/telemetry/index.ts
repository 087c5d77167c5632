/**
 * @fileoverview Barrel for telemetry utilities (instrumentation and semconv).
 * Importing `instrumentation` starts the OpenTelemetry SDK when enabled.
 * @module src/utils/telemetry
 */

export * from './instrumentation.js';
export * from './semconv.js';
