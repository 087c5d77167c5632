/**
 * @fileoverview Pino-backed singleton logger with environment-adaptive output.
 * Implements RFC5424 level mapping, structured context, redaction of
 * sensitive fields and per-message rate limiting. The logger stays silent
 * until {@link Logger.initialize} is called, so the bridge can be embedded in
 * a host application without producing output the host did not ask for.
 * @module src/utils/internal/logger
 */
import path from 'path';

import type { LevelWithSilent, Logger as PinoLogger } from 'pino';
import pino from 'pino';

import { config } from '../../config/index.js';
import { sanitization } from '../security/sanitization.js';
import {
  requestContextService,
  type RequestContext,
} from './requestContext.js';

export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'crit'
  | 'alert'
  | 'emerg';

const logLevelToPinoLevel: Record<LogLevel, LevelWithSilent> = {
  emerg: 'fatal',
  alert: 'fatal',
  crit: 'error',
  error: 'error',
  warning: 'warn',
  notice: 'info',
  info: 'info',
  debug: 'debug',
};

const pinoLevelSeverity: Partial<Record<LevelWithSilent, number>> = {
  fatal: 0,
  error: 2,
  warn: 4,
  info: 6,
  debug: 7,
};

export class Logger {
  private static readonly instance: Logger = new Logger();
  private pinoLogger?: PinoLogger;
  private initialized = false;
  private currentLevel: LogLevel = 'info';

  private rateLimitThreshold = 10;
  private rateLimitWindow = 60000;
  private messageCounts = new Map<
    string,
    { count: number; firstSeen: number }
  >();
  private suppressedMessages = new Map<string, number>();
  private cleanupTimer?: NodeJS.Timeout;

  private constructor() {}

  public static getInstance(): Logger {
    return Logger.instance;
  }

  private async createPinoLogger(level: LogLevel): Promise<PinoLogger> {
    const pinoLevel = logLevelToPinoLevel[level];

    const pinoOptions: pino.LoggerOptions = {
      level: pinoLevel,
      base: {
        env: config.environment,
        version: config.pkg.version,
        pid: process.pid,
      },
      redact: {
        paths: sanitization.getSensitivePinoFields(),
        censor: '[REDACTED]',
      },
    };

    const transports: pino.TransportTargetOptions[] = [];
    const isDevelopment = config.environment === 'development';
    const isTest = config.environment === 'testing';

    if (isDevelopment) {
      // Fall back to JSON on stdout when pino-pretty cannot be resolved.
      try {
        const { createRequire } = await import('node:module');
        const require = createRequire(import.meta.url);
        const prettyTarget = require.resolve('pino-pretty');
        transports.push({
          target: prettyTarget,
          options: { colorize: true, translateTime: 'yyyy-mm-dd HH:MM:ss' },
        });
      } catch (err) {
        console.warn(
          `[Logger Init] Pretty transport unavailable (${err instanceof Error ? err.message : String(err)}); falling back to stdout JSON.`,
        );
        transports.push({ target: 'pino/file', options: { destination: 1 } });
      }
    } else if (!isTest) {
      transports.push({ target: 'pino/file', options: { destination: 1 } });
    }

    if (config.logsPath) {
      transports.push({
        level: pinoLevel,
        target: 'pino/file',
        options: {
          destination: path.join(config.logsPath, 'combined.log'),
          mkdir: true,
        },
      });
      transports.push({
        level: 'error',
        target: 'pino/file',
        options: {
          destination: path.join(config.logsPath, 'error.log'),
          mkdir: true,
        },
      });
    }

    if (transports.length === 0) {
      return pino(pinoOptions);
    }
    return pino({ ...pinoOptions, transport: { targets: transports } });
  }

  public async initialize(level: LogLevel = 'info'): Promise<void> {
    if (this.initialized) {
      this.warning(
        'Logger already initialized.',
        requestContextService.createRequestContext({
          operation: 'loggerReinit',
        }),
      );
      return;
    }
    this.currentLevel = level;
    this.pinoLogger = await this.createPinoLogger(level);

    if (!this.cleanupTimer) {
      this.cleanupTimer = setInterval(
        () => this.flushSuppressedMessages(),
        this.rateLimitWindow,
      );
      this.cleanupTimer.unref();
    }

    this.initialized = true;
    this.info(
      `Logger initialized. Level: ${level}.`,
      requestContextService.createRequestContext({ operation: 'loggerInit' }),
    );
  }

  public setLevel(newLevel: LogLevel): void {
    if (!this.pinoLogger || !this.initialized) {
      console.error('Cannot set level: Logger not initialized.');
      return;
    }
    this.currentLevel = newLevel;
    this.pinoLogger.level = logLevelToPinoLevel[newLevel];
    this.info(
      `Log level changed to ${newLevel}.`,
      requestContextService.createRequestContext({
        operation: 'loggerSetLevel',
      }),
    );
  }

  public async close(): Promise<void> {
    if (!this.initialized) return;
    this.info(
      'Logger shutting down.',
      requestContextService.createRequestContext({ operation: 'loggerClose' }),
    );
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.flushSuppressedMessages();

    const pinoLogger = this.pinoLogger;
    await new Promise<void>((resolve) => {
      if (!pinoLogger) {
        resolve();
        return;
      }
      pinoLogger.flush((err) => {
        if (err) console.error('Error flushing logger:', err);
        resolve();
      });
    });

    this.initialized = false;
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  private isRateLimited(message: string): boolean {
    const now = Date.now();
    const entry = this.messageCounts.get(message);
    if (!entry || now - entry.firstSeen > this.rateLimitWindow) {
      this.messageCounts.set(message, { count: 1, firstSeen: now });
      return false;
    }
    entry.count++;
    if (entry.count > this.rateLimitThreshold) {
      this.suppressedMessages.set(
        message,
        (this.suppressedMessages.get(message) ?? 0) + 1,
      );
      return true;
    }
    return false;
  }

  private flushSuppressedMessages(): void {
    if (this.suppressedMessages.size === 0) return;
    const suppressed = [...this.suppressedMessages.entries()];
    this.suppressedMessages.clear();
    this.messageCounts.clear();
    for (const [message, count] of suppressed) {
      this.warning(
        `Log message suppressed ${count} times due to rate limiting.`,
        requestContextService.createRequestContext({
          operation: 'loggerRateLimitFlush',
          additionalContext: { originalMessage: message },
        }),
      );
    }
  }

  private log(
    level: LogLevel,
    msg: string,
    context?: RequestContext,
    error?: Error,
  ): void {
    if (!this.pinoLogger || !this.initialized) return;

    const pinoLevel = logLevelToPinoLevel[level];
    const levelSeverity = pinoLevelSeverity[pinoLevel];
    const currentLevelSeverity =
      pinoLevelSeverity[logLevelToPinoLevel[this.currentLevel]];

    if (
      levelSeverity !== undefined &&
      currentLevelSeverity !== undefined &&
      levelSeverity > currentLevelSeverity
    ) {
      return;
    }

    if (this.isRateLimited(msg)) return;

    const logObject: Record<string, unknown> = { ...context };
    if (error) logObject.err = pino.stdSerializers.err(error);

    switch (pinoLevel) {
      case 'fatal':
        this.pinoLogger.fatal(logObject, msg);
        break;
      case 'error':
        this.pinoLogger.error(logObject, msg);
        break;
      case 'warn':
        this.pinoLogger.warn(logObject, msg);
        break;
      case 'debug':
        this.pinoLogger.debug(logObject, msg);
        break;
      default:
        this.pinoLogger.info(logObject, msg);
    }
  }

  public debug(msg: string, context?: RequestContext): void {
    this.log('debug', msg, context);
  }
  public info(msg: string, context?: RequestContext): void {
    this.log('info', msg, context);
  }
  public notice(msg: string, context?: RequestContext): void {
    this.log('notice', msg, context);
  }
  public warning(msg: string, context?: RequestContext): void {
    this.log('warning', msg, context);
  }

  public error(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('error', msg, actualContext, errorObj);
  }

  public crit(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('crit', msg, actualContext, errorObj);
  }

  public emerg(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('emerg', msg, actualContext, errorObj);
  }

  public fatal(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    this.emerg(msg, errorOrContext, context);
  }
}

export const logger = Logger.getInstance();
