// src/ratings/types.ts
import type { PlayerMap, PlayerName } from '../model/types';

export type RoundingMode = 'half-even' | 'half-up';

export const ROUNDING_MODES: ReadonlyArray<RoundingMode> = ['half-even', 'half-up'];

/** Constants of the Norwegian update. All of them are tunable. */
export interface RatingConfig {
  /** Rating assumed for anyone without one. */
  defaultRating: number;
  /** Fewer lifetime games than this makes a player provisional. */
  provisionalThreshold: number;
  kStandard: number;
  kProvisional: number;
  /** No recomputed rating goes below this. */
  ratingFloor: number;
  /** Max distance of a performance rating from the average opponent. */
  performanceSpread: number;
  rounding: RoundingMode;
}

export const DEFAULT_RATING = 1500;

export const DEFAULT_RATING_CONFIG: Readonly<RatingConfig> = Object.freeze({
  defaultRating: DEFAULT_RATING,
  provisionalThreshold: 30,
  kStandard: 15,
  kProvisional: 30,
  ratingFloor: 100,
  performanceSpread: 800,
  rounding: 'half-even',
});

/**
 * Everything one player's computation may read. Shared by all players of a
 * pass and never written to.
 */
export interface RatingContext {
  readonly config: Readonly<RatingConfig>;
  readonly players: Readonly<PlayerMap>;
  /** prior ratings with the default filled in */
  readonly snapshot: Readonly<Record<PlayerName, number>>;
  readonly gamesByPlayer: Readonly<Record<PlayerName, ReadonlyArray<RatedGame>>>;
}

/** One game from the rated player's side. */
export interface RatedGame {
  opponent: PlayerName;
  points: number;
}
