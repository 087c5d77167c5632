/**
 * @fileoverview Startup and shutdown for a host process that wants the
 * bridge's full stack: logging, the OpenTelemetry SDK and the DI container.
 * Hosts that only need the free functions can skip this; they work against
 * whatever tracer provider is registered globally.
 * @module src/bootstrap
 */
import type { AppConfig as AppConfigType } from './config/index.js';
import container, {
  AppConfig,
  ContextBridgeToken,
  composeContainer,
} from './container/index.js';
import type { ContextBridge } from './tracing/contextBridge.js';
import { logger } from './utils/internal/logger.js';
import { requestContextService } from './utils/internal/requestContext.js';
import {
  initializeOpenTelemetry,
  shutdownOpenTelemetry,
} from './utils/telemetry/instrumentation.js';

/**
 * Composes the container, initializes the logger at the configured level,
 * starts the SDK when `OTEL_ENABLED` is set, and returns the container's
 * bridge.
 */
export async function initializeBridge(): Promise<ContextBridge> {
  composeContainer();
  const config = container.resolve<AppConfigType>(AppConfig);

  if (!logger.isInitialized()) {
    await logger.initialize(config.logLevel);
  }

  initializeOpenTelemetry(config);

  const startupContext = requestContextService.createRequestContext({
    operation: 'BridgeStartup',
    applicationName: config.pkg.name,
    applicationVersion: config.pkg.version,
    nodeEnvironment: config.environment,
    telemetryEnabled: config.openTelemetry.enabled,
  });
  logger.info(
    `${config.pkg.name} (v${config.pkg.version}) is ready.`,
    startupContext,
  );

  return container.resolve<ContextBridge>(ContextBridgeToken);
}

/**
 * Flushes pending spans, then the logger.
 */
export async function shutdownBridge(): Promise<void> {
  logger.info(
    'Shutting down trace bridge.',
    requestContextService.createRequestContext({
      operation: 'BridgeShutdown',
    }),
  );
  await shutdownOpenTelemetry();
  await logger.close();
}
