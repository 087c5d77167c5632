/**
 * @fileoverview Barrel file for security-related utility modules: id
 * generation and log sanitization.
 * @module src/utils/security
 */

export * from './idGenerator.js';
export * from './sanitization.js';
