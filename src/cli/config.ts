import { z } from 'zod';

import { DEFAULT_MAX_CHARS_PER_FILE } from '../core/bundle/selector.js';
import {
  API_KEY_ENV,
  DEFAULT_ENDPOINT,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
  type CompletionConfig,
} from '../core/completion/types.js';
import { ConfigError } from '../core/errors.js';

export const MODEL_ENV = 'BUNDLESCOPE_MODEL';
export const ENDPOINT_ENV = 'BUNDLESCOPE_ENDPOINT';
export const TIMEOUT_ENV = 'BUNDLESCOPE_TIMEOUT_MS';
export const MAX_CHARS_ENV = 'BUNDLESCOPE_MAX_CHARS';

export const MIN_TIMEOUT_MS = 1_000;
/** Largest delay a Node timer holds; longer ones fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface RunConfig {
  completion: CompletionConfig;
  maxChars: number;
}

export interface ConfigOverrides {
  model?: string;
  maxChars?: number;
  timeoutMs?: number;
}

type Env = Record<string, string | undefined>;

const EndpointSchema = z.string().url().refine((u) => /^https?:\/\//.test(u), 'must be an http(s) URL');

/**
 * Resolve run settings from the environment, with CLI overrides on top.
 * Blank or unparsable numeric variables fall back to their defaults.
 */
export function resolveRunConfig(env: Env = process.env, overrides: ConfigOverrides = {}): RunConfig {
  const endpointRaw = nonBlank(env[ENDPOINT_ENV]) ?? DEFAULT_ENDPOINT;
  const endpoint = EndpointSchema.safeParse(endpointRaw);
  if (!endpoint.success) {
    throw new ConfigError(`${ENDPOINT_ENV} is not a valid URL: ${endpointRaw}`);
  }

  return {
    completion: {
      apiKey: nonBlank(env[API_KEY_ENV]),
      apiKeyVariable: API_KEY_ENV,
      model: nonBlank(overrides.model) ?? nonBlank(env[MODEL_ENV]) ?? DEFAULT_MODEL,
      endpoint: endpoint.data,
      timeoutMs:
        overrides.timeoutMs !== undefined ? clampTimeoutMs(overrides.timeoutMs) : resolveTimeoutMs(env[TIMEOUT_ENV]),
    },
    maxChars: overrides.maxChars ?? resolveMaxChars(env[MAX_CHARS_ENV]),
  };
}

export function resolveTimeoutMs(raw: string | undefined): number {
  if (!raw || !raw.trim()) return DEFAULT_TIMEOUT_MS;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return DEFAULT_TIMEOUT_MS;

  return clampTimeoutMs(parsed);
}

export function clampTimeoutMs(ms: number): number {
  return Math.min(MAX_TIMEOUT_MS, Math.max(MIN_TIMEOUT_MS, Math.floor(ms)));
}

export function resolveMaxChars(raw: string | undefined): number {
  if (!raw || !raw.trim()) return DEFAULT_MAX_CHARS_PER_FILE;

  const parsed = Math.floor(Number(raw));
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_MAX_CHARS_PER_FILE;
  return parsed;
}

function nonBlank(v: string | undefined): string | undefined {
  const t = v?.trim();
  return t ? t : undefined;
}
