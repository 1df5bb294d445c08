/**
 * Configuration validation tests
 */

import { z } from 'zod';
import {
  ENV_KEYS,
  formatValidationErrors,
  validateEnvConfig,
} from '../../src/config/validation.js';

describe('validateEnvConfig', () => {
  test('should apply defaults to an empty environment', () => {
    const result = validateEnvConfig({});

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      REMINDCTL_BIN: 'remindctl',
      REMINDCTL_READ_TIMEOUT_SECS: 10,
      REMINDCTL_WRITE_TIMEOUT_SECS: 20,
      DELETE_ALLOW_MISSING: true,
      HEALTH_CACHE_MS: 5000,
      AUTO_ROUTE_LISTS: true,
    });
  });

  test.each([
    ['true', true],
    [' Yes ', true],
    ['1', true],
    ['FALSE', false],
    ['no', false],
    ['0', false],
  ])('should read boolean flag %j as %s', (raw, expected) => {
    expect(validateEnvConfig({ AUTO_ROUTE_LISTS: raw }).data?.AUTO_ROUTE_LISTS).toBe(expected);
  });

  test('should reject an unknown boolean spelling', () => {
    const result = validateEnvConfig({ AUTH_REQUIRED: 'maybe' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['AUTH_REQUIRED']);
  });

  test('should trim numeric values', () => {
    expect(validateEnvConfig({ REMINDCTL_WRITE_TIMEOUT_SECS: ' 45 ' }).data).toMatchObject({
      REMINDCTL_WRITE_TIMEOUT_SECS: 45,
    });
  });

  test.each(['0', '601'])('should reject a timeout of %s seconds', (raw) => {
    const result = validateEnvConfig({ REMINDCTL_READ_TIMEOUT_SECS: raw });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['REMINDCTL_READ_TIMEOUT_SECS']);
  });

  test('should allow the health cache to be switched off', () => {
    expect(validateEnvConfig({ HEALTH_CACHE_MS: '0' }).data?.HEALTH_CACHE_MS).toBe(0);
  });

  test('should reject a blank binary path', () => {
    const result = validateEnvConfig({ REMINDCTL_BIN: '   ' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['REMINDCTL_BIN']);
  });

  test('should keep the API key as given', () => {
    expect(validateEnvConfig({ API_KEY: 'test-secret' }).data?.API_KEY).toBe('test-secret');
  });
});

describe('ENV_KEYS', () => {
  test('should name every variable the schema reads', () => {
    expect(ENV_KEYS).toEqual([
      'REMINDCTL_BIN',
      'REMINDCTL_READ_TIMEOUT_SECS',
      'REMINDCTL_WRITE_TIMEOUT_SECS',
      'AUTH_REQUIRED',
      'API_KEY',
      'DELETE_ALLOW_MISSING',
      'HEALTH_CACHE_MS',
      'AUTO_ROUTE_LISTS',
    ]);
  });
});

describe('formatValidationErrors', () => {
  test('should label issues without a path as root', () => {
    const error = new z.ZodError([{ code: 'custom', path: [], message: 'expected an object' }]);

    expect(formatValidationErrors(error)).toBe('(root): expected an object');
  });
});
