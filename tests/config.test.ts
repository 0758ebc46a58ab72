import { describe, expect, it } from 'vitest';

import {
  clampTimeoutMs,
  ENDPOINT_ENV,
  MAX_TIMEOUT_MS,
  MAX_CHARS_ENV,
  MODEL_ENV,
  resolveMaxChars,
  resolveRunConfig,
  resolveTimeoutMs,
  TIMEOUT_ENV,
} from '../src/cli/config.js';
import { ConfigError } from '../src/core/errors.js';

describe('resolveRunConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(resolveRunConfig({})).toEqual({
      completion: {
        apiKey: undefined,
        apiKeyVariable: 'OPENAI_API_KEY',
        model: 'gpt-4',
        endpoint: 'https://api.openai.com/v1/chat/completions',
        timeoutMs: 60_000,
      },
      maxChars: 8000,
    });
  });

  it('reads the key, model, endpoint and limits from the environment', () => {
    const config = resolveRunConfig({
      OPENAI_API_KEY: ' test-key ',
      [MODEL_ENV]: 'gpt-4o-mini',
      [ENDPOINT_ENV]: 'http://localhost:8080/v1/chat/completions',
      [TIMEOUT_ENV]: '5000',
      [MAX_CHARS_ENV]: '2000',
    });

    expect(config.completion).toMatchObject({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      endpoint: 'http://localhost:8080/v1/chat/completions',
      timeoutMs: 5000,
    });
    expect(config.maxChars).toBe(2000);
  });

  it('treats a blank key as missing', () => {
    expect(resolveRunConfig({ OPENAI_API_KEY: '   ' }).completion.apiKey).toBeUndefined();
  });

  it('lets overrides win over the environment', () => {
    const config = resolveRunConfig(
      { [MODEL_ENV]: 'from-env', [MAX_CHARS_ENV]: '2000', [TIMEOUT_ENV]: '5000' },
      { model: 'from-flag', maxChars: 100, timeoutMs: 2500 },
    );
    expect(config.completion.model).toBe('from-flag');
    expect(config.completion.timeoutMs).toBe(2500);
    expect(config.maxChars).toBe(100);
  });

  it('rejects an endpoint that is not an http(s) URL', () => {
    expect(() => resolveRunConfig({ [ENDPOINT_ENV]: 'not a url' })).toThrow(ConfigError);
    expect(() => resolveRunConfig({ [ENDPOINT_ENV]: 'ftp://example.test/x' })).toThrow(
      'BUNDLESCOPE_ENDPOINT is not a valid URL: ftp://example.test/x',
    );
  });
});

describe('resolveTimeoutMs', () => {
  it('defaults to 60 seconds when unset or blank', () => {
    expect(resolveTimeoutMs(undefined)).toBe(60_000);
    expect(resolveTimeoutMs('  ')).toBe(60_000);
  });

  it('falls back to default for non-numeric values', () => {
    expect(resolveTimeoutMs('soon')).toBe(60_000);
  });

  it('clamps values below one second', () => {
    expect(resolveTimeoutMs('10')).toBe(1_000);
  });

  it('floors decimals', () => {
    expect(resolveTimeoutMs('2500.9')).toBe(2_500);
  });

  it('clamps values a timer cannot hold', () => {
    expect(resolveTimeoutMs('3000000000')).toBe(MAX_TIMEOUT_MS);
    expect(resolveTimeoutMs('2147483647')).toBe(2_147_483_647);
  });
});

describe('clampTimeoutMs', () => {
  it('bounds flag values the same way as the environment', () => {
    expect(clampTimeoutMs(50)).toBe(1_000);
    expect(clampTimeoutMs(3_000_000_000)).toBe(2_147_483_647);
    expect(resolveRunConfig({}, { timeoutMs: 3_000_000_000 }).completion.timeoutMs).toBe(2_147_483_647);
  });
});

describe('resolveMaxChars', () => {
  it('falls back to 8000 for missing, non-numeric or non-positive values', () => {
    expect(resolveMaxChars(undefined)).toBe(8000);
    expect(resolveMaxChars('lots')).toBe(8000);
    expect(resolveMaxChars('0')).toBe(8000);
  });

  it('accepts positive values', () => {
    expect(resolveMaxChars('120.7')).toBe(120);
  });
});
