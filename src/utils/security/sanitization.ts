/**
 * @fileoverview Redaction of sensitive values before they reach the logs.
 * Task headers routinely carry credentials next to trace context (an
 * `authorization` header forwarded to a worker, an API token for a callback),
 * so anything that logs headers or task arguments goes through here first.
 * @module src/utils/security/sanitization
 */
import { logger } from '../internal/logger.js';
import { requestContextService } from '../internal/requestContext.js';

export const REDACTED = '[REDACTED]';

export class Sanitization {
  private static instance: Sanitization;

  /**
   * Field names considered sensitive. Matching is case-insensitive and works
   * on whole keys as well as on the words of camelCase, snake_case and
   * kebab-case keys.
   */
  private readonly sensitiveFields: readonly string[] = [
    'password',
    'token',
    'secret',
    'apiKey',
    'credential',
    'jwt',
    'authorization',
    'cookie',
    'clientsecret',
    'client_secret',
    'private_key',
    'privatekey',
  ];

  private constructor() {}

  public static getInstance(): Sanitization {
    if (!Sanitization.instance) {
      Sanitization.instance = new Sanitization();
    }
    return Sanitization.instance;
  }

  /**
   * Sensitive field names in the form pino's `redact.paths` accepts.
   */
  public getSensitivePinoFields(): string[] {
    return this.sensitiveFields.map((field) => field.replace(/[-_]/g, ''));
  }

  /**
   * Deep-clones `input` and replaces the values of sensitive fields with
   * `[REDACTED]`. Primitives are returned unchanged; values that cannot be
   * cloned (functions, class instances holding sockets) produce
   * `[Log Sanitization Failed]`.
   */
  public sanitizeForLogging(input: unknown): unknown {
    try {
      if (!input || typeof input !== 'object') return input;

      const clonedInput: unknown = structuredClone(input);
      this.redactSensitiveFields(clonedInput);
      return clonedInput;
    } catch (error) {
      logger.error(
        'Error during log sanitization, returning placeholder.',
        requestContextService.createRequestContext({
          operation: 'Sanitization.sanitizeForLogging.error',
          additionalContext: {
            errorMessage:
              error instanceof Error ? error.message : String(error),
          },
        }),
      );
      return '[Log Sanitization Failed]';
    }
  }

  private redactSensitiveFields(obj: unknown): void {
    if (!obj || typeof obj !== 'object') return;

    if (Array.isArray(obj)) {
      obj.forEach((item) => this.redactSensitiveFields(item));
      return;
    }

    const normalize = (str: string): string =>
      str.toLowerCase().replace(/[^a-z0-9]/g, '');
    const normalizedSensitiveSet = new Set(
      this.sensitiveFields.map((f) => normalize(f)).filter(Boolean),
    );
    const wordSensitiveSet = new Set(
      this.sensitiveFields.map((f) => f.toLowerCase()).filter(Boolean),
    );

    const entries: [string, unknown][] = Object.entries(obj);
    for (const [key, value] of entries) {
      const keyWords = key
        .replace(/([A-Z])/g, ' $1')
        .toLowerCase()
        .split(/[\s_-]+/)
        .filter(Boolean);

      const isSensitive =
        normalizedSensitiveSet.has(normalize(key)) ||
        keyWords.some((w) => wordSensitiveSet.has(w));

      if (isSensitive) {
        Reflect.set(obj, key, REDACTED);
      } else if (value && typeof value === 'object') {
        this.redactSensitiveFields(value);
      }
    }
  }
}

/**
 * Singleton instance of the `Sanitization` class.
 */
export const sanitization = Sanitization.getInstance();

/**
 * Convenience function calling `sanitization.sanitizeForLogging`.
 */
export const sanitizeInputForLogging = (input: unknown): unknown =>
  sanitization.sanitizeForLogging(input);
