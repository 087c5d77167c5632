/**
 * @fileoverview Tests for the id generation helpers.
 * @module tests/utils/security/idGenerator.test
 */
import { describe, expect, it } from 'vitest';

import {
  generateRequestContextId,
  generateSecureRandomString,
  generateUUID,
} from '../../../src/utils/security/idGenerator.js';

describe('generateUUID', () => {
  it('generates a valid v4 UUID', () => {
    expect(generateUUID()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i,
    );
  });

  it('generates distinct values', () => {
    expect(generateUUID()).not.toBe(generateUUID());
  });
});

describe('generateRequestContextId', () => {
  it('generates two groups of five uppercase alphanumerics', () => {
    const id = generateRequestContextId();
    expect(id).toMatch(/^[A-Z0-9]{5}-[A-Z0-9]{5}$/);
    expect(id).toHaveLength(11);
  });
});

describe('generateSecureRandomString', () => {
  it('uses only characters of the given charset', () => {
    const value = generateSecureRandomString(64, 'ab');
    expect(value).toHaveLength(64);
    expect(value).toMatch(/^[ab]+$/);
  });

  it('returns an empty string for length zero', () => {
    expect(generateSecureRandomString(0)).toBe('');
  });
});
