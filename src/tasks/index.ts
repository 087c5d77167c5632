/**
 * @fileoverview Barrel for the task model.
 * @module src/tasks
 */

export * from './signature.js';
export type * from './types.js';
export * from './workflow.js';
