/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Values are sourced from environment variables (optionally via a `.env`
 * file) and validated with Zod so every consumer sees a typed, defaulted
 * configuration object.
 * @module src/config/index
 */
import { homedir } from 'os';

import dotenv from 'dotenv';
import { z } from 'zod';

import packageJson from '../../package.json' with { type: 'json' };
import { BridgeError, BridgeErrorCode } from '../types-global/errors.js';

type PackageManifest = {
  name?: string;
  version?: string;
  description?: string;
};

const packageManifest: PackageManifest = packageJson;

dotenv.config({ quiet: true });

// --- Helper Functions ---
const emptyStringAsUndefined = (val: unknown) => {
  if (typeof val === 'string' && val.trim() === '') {
    return undefined;
  }
  return val;
};

/**
 * Expands a leading tilde to the user's home directory.
 * Returns undefined for empty/undefined inputs.
 *
 * @example
 * expandTildePath('~/logs') // '/home/me/logs'
 * expandTildePath('/var/log/bridge') // '/var/log/bridge'
 */
const expandTildePath = (path: unknown): string | undefined => {
  if (typeof path !== 'string' || path.trim() === '') {
    return undefined;
  }

  const trimmed = path.trim();

  if (trimmed.startsWith('~/')) {
    return `${homedir()}${trimmed.slice(1)}`;
  }

  if (trimmed === '~') {
    return homedir();
  }

  return trimmed;
};

/**
 * Builds a preprocessor that lower-cases a string and maps known aliases.
 */
const aliasPreprocessor =
  (aliasMap: Record<string, string>) =>
  (val: unknown): unknown => {
    const str = emptyStringAsUndefined(val);
    if (typeof str === 'string') {
      const lower = str.toLowerCase();
      return aliasMap[lower] ?? lower;
    }
    return str;
  };

const booleanFromEnv = z.preprocess((val) => {
  const str = emptyStringAsUndefined(val);
  if (typeof str === 'string') {
    return ['1', 'true', 'yes', 'on'].includes(str.trim().toLowerCase());
  }
  return str;
}, z.boolean().default(false));

// --- Schema Definition ---
const ConfigSchema = z.object({
  pkg: z.object({
    name: z.string(),
    version: z.string(),
    description: z.string().optional(),
  }),
  logLevel: z
    .preprocess(
      aliasPreprocessor({
        warn: 'warning',
        err: 'error',
        information: 'info',
        critical: 'crit',
        fatal: 'emerg',
      }),
      z.enum([
        'debug',
        'info',
        'notice',
        'warning',
        'error',
        'crit',
        'alert',
        'emerg',
      ]),
    )
    .default('debug'),
  logsPath: z.preprocess(expandTildePath, z.string().optional()),
  environment: z
    .preprocess(
      aliasPreprocessor({
        dev: 'development',
        prod: 'production',
        test: 'testing',
      }),
      z.enum(['development', 'production', 'testing']),
    )
    .default('development'),
  tracing: z.object({
    tracerName: z.string(),
    spanComponent: z.preprocess(
      emptyStringAsUndefined,
      z.string().default('task-queue'),
    ),
  }),
  openTelemetry: z.object({
    enabled: booleanFromEnv,
    serviceName: z.string(),
    serviceVersion: z.string(),
    tracesEndpoint: z.preprocess(
      emptyStringAsUndefined,
      z.string().url().optional(),
    ),
    samplingRatio: z.preprocess(
      emptyStringAsUndefined,
      z.coerce.number().min(0).max(1).default(1.0),
    ),
    logLevel: z
      .preprocess(
        (val) => {
          const str = emptyStringAsUndefined(val);
          if (typeof str === 'string') {
            const lower = str.toLowerCase();
            const aliasMap: Record<string, string> = {
              err: 'ERROR',
              warning: 'WARN',
              information: 'INFO',
            };
            return aliasMap[lower] ?? str.toUpperCase();
          }
          return str;
        },
        z.enum(['NONE', 'ERROR', 'WARN', 'INFO', 'DEBUG', 'VERBOSE', 'ALL']),
      )
      .default('INFO'),
  }),
});

// --- Parsing Logic ---
const parseConfig = () => {
  const env = process.env;

  const pkgSchema = z.object({
    name: z.string(),
    version: z.string(),
    description: z.string().optional(),
  });
  const parsedPkg = pkgSchema.parse({
    name: env.PACKAGE_NAME ?? packageManifest.name,
    version: env.PACKAGE_VERSION ?? packageManifest.version,
    description: env.PACKAGE_DESCRIPTION ?? packageManifest.description,
  });

  const rawConfig = {
    pkg: parsedPkg,
    logLevel: env.LOG_LEVEL,
    logsPath: env.LOGS_DIR,
    environment: env.NODE_ENV,
    tracing: {
      tracerName: env.TRACING_TRACER_NAME ?? parsedPkg.name,
      spanComponent: env.TRACING_SPAN_COMPONENT,
    },
    openTelemetry: {
      enabled: env.OTEL_ENABLED,
      serviceName: env.OTEL_SERVICE_NAME ?? parsedPkg.name,
      serviceVersion: env.OTEL_SERVICE_VERSION ?? parsedPkg.version,
      tracesEndpoint: env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
      samplingRatio: env.OTEL_TRACES_SAMPLER_ARG,
      logLevel: env.OTEL_LOG_LEVEL,
    },
  };

  const parsedConfig = ConfigSchema.safeParse(rawConfig);

  if (!parsedConfig.success) {
    if (process.stdout.isTTY) {
      console.error(
        'Invalid configuration found. Please check your environment variables.',
        parsedConfig.error.flatten().fieldErrors,
      );
    }
    throw new BridgeError(
      BridgeErrorCode.ConfigurationError,
      'Invalid application configuration.',
      {
        validationErrors: parsedConfig.error.flatten().fieldErrors,
      },
    );
  }

  return parsedConfig.data;
};

const config = parseConfig();

/**
 * Export the runtime configuration, parser, and schema, plus a static AppConfig type.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

export { config, ConfigSchema, parseConfig };
