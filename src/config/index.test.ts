import { describe, it, expect } from '@jest/globals';
import { InvalidInputError } from '../utils/errors.js';
import { parseNonNegativeInt, parseRetries, parseStatus, resolveConfig } from './index.js';

describe('resolveConfig', () => {
  it('falls back to defaults with an empty environment', () => {
    expect(resolveConfig({})).toEqual({
      accessToken: undefined,
      tenantId: undefined,
      outputDir: 'exports',
      apiVersion: 'v20.0',
      verbose: false,
      maxRetries: 3,
      backoffMs: 5000,
    });
  });

  it('reads every supported variable', () => {
    expect(
      resolveConfig({
        WORKPLACE_ACCESS_TOKEN: 'test-token',
        WORKPLACE_TENANT_ID: 'T1',
        WORKPLACE_EXPORT_DIR: '/data/exports',
        WORKPLACE_GRAPH_API_VERSION: 'v21.0',
        WORKPLACE_LOG_LEVEL: 'debug',
        WORKPLACE_MAX_RETRIES: '5',
        WORKPLACE_RETRY_BACKOFF_MS: '100',
      })
    ).toEqual({
      accessToken: 'test-token',
      tenantId: 'T1',
      outputDir: '/data/exports',
      apiVersion: 'v21.0',
      verbose: true,
      maxRetries: 5,
      backoffMs: 100,
    });
  });

  it('accepts WORKPLACE_TOKEN as an alias', () => {
    expect(resolveConfig({ WORKPLACE_TOKEN: 'test-token' }).accessToken).toBe('test-token');
    expect(
      resolveConfig({ WORKPLACE_ACCESS_TOKEN: 'primary-token', WORKPLACE_TOKEN: 'test-token' }).accessToken
    ).toBe('primary-token');
  });

  it('ignores blank values', () => {
    expect(resolveConfig({ WORKPLACE_ACCESS_TOKEN: '  ', WORKPLACE_EXPORT_DIR: '' })).toMatchObject({
      accessToken: undefined,
      outputDir: 'exports',
    });
  });

  it('rejects a malformed retry count', () => {
    expect(() => resolveConfig({ WORKPLACE_MAX_RETRIES: 'three' })).toThrow(
      'WORKPLACE_MAX_RETRIES must be a non-negative integer, got: three'
    );
  });
});

describe('parseNonNegativeInt', () => {
  it('parses digits', () => {
    expect(parseNonNegativeInt('n', ' 12 ')).toBe(12);
    expect(parseNonNegativeInt('n', '0')).toBe(0);
  });

  it('rejects negatives and fractions', () => {
    expect(() => parseNonNegativeInt('n', '-1')).toThrow(InvalidInputError);
    expect(() => parseNonNegativeInt('n', '1.5')).toThrow(InvalidInputError);
  });
});

describe('parseRetries', () => {
  it('names the flag in its error', () => {
    expect(() => parseRetries('x')).toThrow('--max-retries must be a non-negative integer, got: x');
  });
});

describe('parseStatus', () => {
  it('normalizes known statuses', () => {
    expect(parseStatus('COMPLETED')).toBe('completed');
    expect(parseStatus('running')).toBe('in_progress');
  });

  it('treats blank and "all" as no filter', () => {
    expect(parseStatus('')).toBeUndefined();
    expect(parseStatus('ALL')).toBeUndefined();
  });

  it('rejects unknown statuses', () => {
    expect(() => parseStatus('bogus')).toThrow(
      'Invalid status filter: "bogus". Expected one of: pending, in_progress, completed, failed'
    );
  });
});
