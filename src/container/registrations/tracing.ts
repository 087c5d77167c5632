/**
 * @fileoverview Registers the trace propagation services: the text-map
 * propagator, the context bridge built on it and the dispatch tracer built
 * on the bridge. All three are singletons for the container's lifetime.
 * @module src/container/registrations/tracing
 */
import type { TextMapPropagator } from '@opentelemetry/api';
import { container, instanceCachingFactory } from 'tsyringe';

import type { AppConfig as AppConfigType } from '../../config/index.js';
import { ContextBridge } from '../../tracing/contextBridge.js';
import { TaskDispatchTracer } from '../../tracing/dispatch.js';
import { createDefaultPropagator } from '../../tracing/propagator.js';
import { logger } from '../../utils/internal/logger.js';
import {
  AppConfig,
  ContextBridgeToken,
  TaskDispatchTracerToken,
  TextMapPropagatorToken,
} from '../tokens.js';

/**
 * Registers tracing services with the tsyringe container.
 */
export const registerTracingServices = () => {
  container.register<TextMapPropagator>(TextMapPropagatorToken, {
    useFactory: instanceCachingFactory(() => createDefaultPropagator()),
  });

  container.register<ContextBridge>(ContextBridgeToken, {
    useFactory: instanceCachingFactory((c) => {
      const cfg = c.resolve<AppConfigType>(AppConfig);
      return new ContextBridge({
        propagator: c.resolve<TextMapPropagator>(TextMapPropagatorToken),
        tracerName: cfg.tracing.tracerName,
        tracerVersion: cfg.pkg.version,
      });
    }),
  });

  container.register<TaskDispatchTracer>(TaskDispatchTracerToken, {
    useFactory: instanceCachingFactory((c) => {
      const cfg = c.resolve<AppConfigType>(AppConfig);
      return new TaskDispatchTracer(
        c.resolve<ContextBridge>(ContextBridgeToken),
        cfg.tracing.spanComponent,
      );
    }),
  });

  logger.info('Tracing services registered with the DI container.');
};
