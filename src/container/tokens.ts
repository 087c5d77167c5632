/**
 * @fileoverview Defines all dependency injection tokens for the application.
 * This file centralizes the Symbols used for registering and resolving dependencies
 * in the container, breaking circular reference issues.
 * @module src/container/tokens
 */

// Use tokens for non-class dependencies or for multi-injection.
export const AppConfig = Symbol('AppConfig');
export const Logger = Symbol('Logger');
export const TextMapPropagatorToken = Symbol('TextMapPropagator');
export const ContextBridgeToken = Symbol('ContextBridge');
export const TaskDispatchTracerToken = Symbol('TaskDispatchTracer');
