// src/ratings/index.ts
export type {
  RatingConfig,
  RatingContext,
  RatedGame,
  RoundingMode,
} from './types';
export { DEFAULT_RATING, DEFAULT_RATING_CONFIG, ROUNDING_MODES } from './types';

export { expectedScore, performanceRating, roundRating } from './elo';
export { resolveRatingConfig, isRoundingMode, NUMERIC_KEYS, type NumericKey } from './config';
export { computeNewRatings, computeRatingChange, createRatingContext } from './norwegian';
