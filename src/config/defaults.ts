// src/config/defaults.ts
import type { RatingConfig } from '../ratings/types';

export const ENV_MAP: Readonly<Record<keyof RatingConfig, string>> = {
  defaultRating: 'RATING_DEFAULT',
  provisionalThreshold: 'RATING_PROVISIONAL_THRESHOLD',
  kStandard: 'RATING_K_STANDARD',
  kProvisional: 'RATING_K_PROVISIONAL',
  ratingFloor: 'RATING_FLOOR',
  performanceSpread: 'RATING_PERFORMANCE_SPREAD',
  rounding: 'RATING_ROUNDING',
};

export const LOG_LEVEL_ENV = 'LOG_LEVEL';
