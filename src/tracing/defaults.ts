/**
 * @fileoverview Process-wide default bridge and the free functions that
 * delegate to it. Code that does not need its own propagator or tracer
 * provider calls these directly.
 * @module src/tracing/defaults
 */
import type { Context, SpanOptions } from '@opentelemetry/api';

import { config } from '../config/index.js';
import type { Chain, Chord, Group, Headers, Signature } from '../tasks/types.js';
import {
  ContextBridge,
  type ContextBridgeOptions,
  type SpanStart,
} from './contextBridge.js';
import { createDefaultPropagator } from './propagator.js';

export const defaultPropagator = createDefaultPropagator();

export const defaultContextBridge = new ContextBridge({
  propagator: defaultPropagator,
  tracerName: config.tracing.tracerName,
  tracerVersion: config.pkg.version,
});

/**
 * Builds a bridge with its own propagator and/or tracer provider.
 */
export function createContextBridge(
  options: ContextBridgeOptions = {},
): ContextBridge {
  return new ContextBridge({
    tracerName: config.tracing.tracerName,
    tracerVersion: config.pkg.version,
    ...options,
  });
}

export function startSpanFromHeaders(
  headers: Headers | null | undefined,
  operationName: string,
  options?: SpanOptions,
): SpanStart {
  return defaultContextBridge.startSpanFromHeaders(
    headers,
    operationName,
    options,
  );
}

export function constructContextFromHeaders(
  headers: Headers | null | undefined,
): Context {
  return defaultContextBridge.constructContextFromHeaders(headers);
}

export function headersWithContext(
  headers: Headers | null | undefined,
  context: Context,
): Headers {
  return defaultContextBridge.headersWithContext(headers, context);
}

export function annotateSpanWithSignatureInfo(
  context: Context,
  signature: Signature,
): void {
  defaultContextBridge.annotateSignature(context, signature);
}

export function annotateSpanWithChainInfo(
  context: Context,
  chain: Chain,
): void {
  defaultContextBridge.annotateChain(context, chain);
}

export function annotateSpanWithGroupInfo(
  context: Context,
  group: Group,
  concurrency: number,
): void {
  defaultContextBridge.annotateGroup(context, group, concurrency);
}

export function annotateSpanWithChordInfo(
  context: Context,
  chord: Chord,
  concurrency: number,
): void {
  defaultContextBridge.annotateChord(context, chord, concurrency);
}
