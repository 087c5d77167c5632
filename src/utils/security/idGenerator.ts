/**
 * @fileoverview Identifier helpers: standard UUIDs for tasks and groups, and
 * short readable ids for request contexts.
 *
 * No logging in this module: `requestContextService` imports it, and the
 * logger imports `requestContextService`.
 * @module src/utils/security/idGenerator
 */
import { randomBytes, randomUUID as cryptoRandomUUID } from 'crypto';

const REQUEST_ID_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Generates a cryptographically secure random string from `charset`,
 * using rejection sampling so every character is equally likely.
 */
export const generateSecureRandomString = (
  length: number,
  charset: string = REQUEST_ID_CHARSET,
): string => {
  let result = '';
  const maxValidByteValue = Math.floor(256 / charset.length) * charset.length;

  while (result.length < length) {
    const byte = randomBytes(1)[0];

    if (byte !== undefined && byte < maxValidByteValue) {
      const char = charset[byte % charset.length];
      if (char) {
        result += char;
      }
    }
  }
  return result;
};

/**
 * Generates a standard Version 4 UUID.
 */
export const generateUUID = (): string => {
  return cryptoRandomUUID();
};

/**
 * Generates a 10-character id with a hyphen in the middle (e.g. `ABCDE-FGHIJ`)
 * for request contexts.
 */
export const generateRequestContextId = (): string => {
  const part1 = generateSecureRandomString(5);
  const part2 = generateSecureRandomString(5);
  return `${part1}-${part2}`;
};
