/**
 * @fileoverview OpenTelemetry SDK initialization and lifecycle management.
 * A host process that wants the bridge's spans exported imports this module
 * (or calls {@link initializeOpenTelemetry}) before anything else, with
 * `OTEL_ENABLED=true`. The SDK is registered with the bridge's composite
 * propagator so code using the global `propagation` API and code using the
 * bridge agree on the carrier keys.
 * @module src/utils/telemetry/instrumentation
 */
import { DiagConsoleLogger, DiagLogLevel, diag } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { PinoInstrumentation } from '@opentelemetry/instrumentation-pino';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { NodeSDK } from '@opentelemetry/sdk-node';
import {
  BatchSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from '@opentelemetry/sdk-trace-node';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';

import { config, type AppConfig } from '../../config/index.js';
import { createDefaultPropagator } from '../../tracing/propagator.js';

export let sdk: NodeSDK | null = null;

/**
 * Starts the SDK once. Returns the running SDK, or `null` when telemetry is
 * disabled or startup failed (the failure is reported through `diag`).
 */
export function initializeOpenTelemetry(
  appConfig: AppConfig = config,
): NodeSDK | null {
  if (sdk || !appConfig.openTelemetry.enabled) {
    return sdk;
  }

  try {
    diag.setLogger(
      new DiagConsoleLogger(),
      DiagLogLevel[appConfig.openTelemetry.logLevel],
    );

    const tracesEndpoint = appConfig.openTelemetry.tracesEndpoint;

    const resource = resourceFromAttributes({
      [ATTR_SERVICE_NAME]: appConfig.openTelemetry.serviceName,
      [ATTR_SERVICE_VERSION]: appConfig.openTelemetry.serviceVersion,
      'deployment.environment.name': appConfig.environment,
    });

    const spanProcessors: SpanProcessor[] = [];
    if (tracesEndpoint) {
      diag.info(`Using OTLP exporter for traces, endpoint: ${tracesEndpoint}`);
      spanProcessors.push(
        new BatchSpanProcessor(new OTLPTraceExporter({ url: tracesEndpoint })),
      );
    } else {
      diag.warn(
        'OTEL_ENABLED is true, but no OTLP traces endpoint is configured. Traces will not be exported.',
      );
    }

    const instance = new NodeSDK({
      resource,
      spanProcessors,
      sampler: new TraceIdRatioBasedSampler(
        appConfig.openTelemetry.samplingRatio,
      ),
      textMapPropagator: createDefaultPropagator(),
      instrumentations: [
        new PinoInstrumentation({
          logHook: (span, record) => {
            record['trace_id'] = span.spanContext().traceId;
            record['span_id'] = span.spanContext().spanId;
          },
        }),
      ],
    });

    instance.start();
    sdk = instance;
    diag.info(
      `OpenTelemetry initialized for ${appConfig.openTelemetry.serviceName} v${appConfig.openTelemetry.serviceVersion}`,
    );
  } catch (error) {
    diag.error('Error initializing OpenTelemetry', error);
    sdk = null;
  }
  return sdk;
}

/**
 * Gracefully shuts down the OpenTelemetry SDK, flushing pending spans.
 */
export async function shutdownOpenTelemetry(): Promise<void> {
  if (!sdk) return;
  try {
    await sdk.shutdown();
    diag.info('OpenTelemetry terminated successfully.');
  } catch (error) {
    diag.error('Error terminating OpenTelemetry', error);
  } finally {
    sdk = null;
  }
}

if (config.openTelemetry.enabled) {
  initializeOpenTelemetry();
}
