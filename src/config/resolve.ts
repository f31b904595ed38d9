// src/config/resolve.ts
import { ConfigError } from '../errors';
import { NUMERIC_KEYS, isRoundingMode, resolveRatingConfig } from '../ratings/config';
import type { RatingConfig } from '../ratings/types';
import { ENV_MAP } from './defaults';

export type Env = Readonly<Record<string, string | undefined>>;

export interface ConfigSources {
  /** already parsed config file, with its path for messages */
  file?: { path: string; values: Partial<RatingConfig> };
  env?: Env;
  overrides?: Partial<RatingConfig>;
}

export function readEnvConfig(env: Env): Partial<RatingConfig> {
  const out: Partial<RatingConfig> = {};
  for (const key of NUMERIC_KEYS) {
    const raw = env[ENV_MAP[key]];
    if (raw === undefined || raw.trim() === '') continue;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
      throw new ConfigError(`${ENV_MAP[key]} must be a number (got "${raw}")`);
    }
    out[key] = n;
  }
  const rounding = env[ENV_MAP.rounding];
  if (rounding !== undefined && rounding.trim() !== '') {
    if (!isRoundingMode(rounding)) {
      throw new ConfigError(`${ENV_MAP.rounding} must be "half-even" or "half-up" (got "${rounding}")`);
    }
    out.rounding = rounding;
  }
  return out;
}

/**
 * defaults < config file < environment < explicit overrides.
 * Each layer is checked on its own so errors name their source.
 */
export function resolveConfig(sources: ConfigSources = {}): RatingConfig {
  const layers: Array<[string, Partial<RatingConfig>]> = [];
  if (sources.file) layers.push([sources.file.path, sources.file.values]);
  if (sources.env) layers.push(['environment', readEnvConfig(sources.env)]);
  if (sources.overrides) layers.push(['overrides', sources.overrides]);

  let merged: Partial<RatingConfig> = {};
  for (const [source, values] of layers) {
    resolveRatingConfig(values, source);
    merged = { ...merged, ...values };
  }
  return resolveRatingConfig(merged, 'configuration');
}
