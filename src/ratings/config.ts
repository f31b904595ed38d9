// src/ratings/config.ts
import { ConfigError } from '../errors';
import {
  DEFAULT_RATING_CONFIG,
  ROUNDING_MODES,
  type RatingConfig,
  type RoundingMode,
} from './types';

export type NumericKey = Exclude<keyof RatingConfig, 'rounding'>;

export const NUMERIC_KEYS: ReadonlyArray<NumericKey> = [
  'defaultRating',
  'provisionalThreshold',
  'kStandard',
  'kProvisional',
  'ratingFloor',
  'performanceSpread',
];

const INTEGER_KEYS: ReadonlyArray<NumericKey> = [
  'defaultRating',
  'provisionalThreshold',
  'ratingFloor',
];

export function isRoundingMode(x: string): x is RoundingMode {
  return ROUNDING_MODES.some((m) => m === x);
}

/**
 * Fills in defaults and rejects values the engine cannot work with.
 * `source` names where the values came from, for the error message.
 */
export function resolveRatingConfig(
  partial?: Partial<RatingConfig>,
  source = 'rating options'
): RatingConfig {
  const cfg: RatingConfig = { ...DEFAULT_RATING_CONFIG };

  for (const key of NUMERIC_KEYS) {
    const v = partial?.[key];
    if (v === undefined) continue;
    if (typeof v !== 'number') {
      throw new ConfigError(`${source}: ${key} must be a number (got "${String(v)}")`);
    }
    cfg[key] = v;
  }
  const rounding = partial?.rounding;
  if (rounding !== undefined) {
    if (!isRoundingMode(rounding)) {
      throw new ConfigError(
        `${source}: rounding must be one of ${ROUNDING_MODES.join(', ')} (got "${String(rounding)}")`
      );
    }
    cfg.rounding = rounding;
  }

  for (const key of INTEGER_KEYS) {
    if (!Number.isInteger(cfg[key]) || cfg[key] < 0) {
      throw new ConfigError(`${source}: ${key} must be a non-negative integer (got ${cfg[key]})`);
    }
  }
  for (const key of ['kStandard', 'kProvisional'] as const) {
    if (!Number.isFinite(cfg[key]) || cfg[key] < 0) {
      throw new ConfigError(`${source}: ${key} must be a non-negative number (got ${cfg[key]})`);
    }
  }
  if (!Number.isFinite(cfg.performanceSpread) || cfg.performanceSpread <= 0) {
    throw new ConfigError(
      `${source}: performanceSpread must be a positive number (got ${cfg.performanceSpread})`
    );
  }
  return cfg;
}
