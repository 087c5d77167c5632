/**
 * @fileoverview Barrel file for trace context propagation across the task
 * queue boundary.
 * @module src/tracing
 */

export * from './contextBridge.js';
export * from './defaults.js';
export * from './dispatch.js';
export * from './headerAdapter.js';
export * from './propagator.js';
export * from './spanAnnotator.js';
