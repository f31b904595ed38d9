// src/ratings/norwegian.ts
// Norwegian-system rating update. Every player is rated against the same
// frozen snapshot of pre-tournament ratings.

import { validate } from '../model/validate';
import { pointsFor } from '../model/tournament';
import type {
  GameResult,
  PlayerMap,
  PlayerName,
  RatingChange,
  RatingChanges,
} from '../model/types';
import { resolveRatingConfig } from './config';
import { expectedScore, performanceRating, roundRating } from './elo';
import type { RatedGame, RatingConfig, RatingContext } from './types';

function sum(ns: number[]): number {
  return ns.reduce((a, b) => a + b, 0);
}

/**
 * Freezes everything a pass reads: the resolved config, prior ratings with
 * the default filled in, and each player's games. Does not validate.
 */
export function createRatingContext(
  players: Readonly<PlayerMap>,
  games: ReadonlyArray<GameResult>,
  config: Readonly<RatingConfig>
): RatingContext {
  const snapshot: Record<PlayerName, number> = Object.create(null);
  const byPlayer: Record<PlayerName, RatedGame[]> = Object.create(null);

  for (const name of Object.keys(players)) {
    snapshot[name] = players[name]?.priorRating ?? config.defaultRating;
    byPlayer[name] = [];
  }
  for (const g of games) {
    (byPlayer[g.playerA] ||= []).push({ opponent: g.playerB, points: pointsFor(g.outcome, 'A') });
    (byPlayer[g.playerB] ||= []).push({ opponent: g.playerA, points: pointsFor(g.outcome, 'B') });
  }
  for (const list of Object.values(byPlayer)) Object.freeze(list);

  return Object.freeze({
    config: Object.freeze({ ...config }),
    players,
    snapshot: Object.freeze(snapshot),
    gamesByPlayer: Object.freeze(byPlayer),
  });
}

/** Rates one player. Reads the context only, so call order never matters. */
export function computeRatingChange(name: PlayerName, ctx: RatingContext): RatingChange {
  const { config, snapshot } = ctx;
  const player = ctx.players[name];
  const oldRating = player?.priorRating ?? null;
  const lifetime = player?.gamesPlayedLifetime ?? 0;
  const provisional = lifetime < config.provisionalThreshold;
  const start = snapshot[name] ?? config.defaultRating;
  const games = ctx.gamesByPlayer[name] ?? [];

  if (games.length === 0) {
    return {
      name,
      oldRating,
      newRating: start,
      change: oldRating === null ? null : 0,
      performanceRating: null,
      expectedScore: 0,
      actualScore: 0,
      gamesPlayed: 0,
      provisional,
      kFactor: null,
      method: 'unchanged',
    };
  }

  const oppRatings = games.map((g) => snapshot[g.opponent] ?? config.defaultRating);
  const expected = sum(oppRatings.map((r) => expectedScore(start, r)));
  const actual = sum(games.map((g) => g.points));
  const avgOpp = sum(oppRatings) / games.length;
  const perf = performanceRating(avgOpp, actual / games.length, config.performanceSpread);
  const perfRating = roundRating(perf, config.rounding);

  const floor = Math.max(config.ratingFloor, player?.ratingFloor ?? 0);
  const bound = (x: number): number => Math.max(floor, roundRating(x, config.rounding));

  if (oldRating === null && provisional) {
    const newRating = bound(perf);
    return {
      name,
      oldRating,
      newRating,
      change: null,
      performanceRating: perfRating,
      expectedScore: expected,
      actualScore: actual,
      gamesPlayed: games.length,
      provisional,
      kFactor: null,
      method: 'performance',
    };
  }

  const K = provisional ? config.kProvisional : config.kStandard;
  const newRating = bound(start + K * (actual - expected));
  return {
    name,
    oldRating,
    newRating,
    change: oldRating === null ? null : newRating - oldRating,
    performanceRating: perfRating,
    expectedScore: expected,
    actualScore: actual,
    gamesPlayed: games.length,
    provisional,
    kFactor: K,
    method: 'update',
  };
}

/**
 * New ratings for every player in `players`.
 * Throws ValidationError on malformed input, ConfigError on bad options.
 */
export function computeNewRatings(
  players: Readonly<PlayerMap>,
  games: ReadonlyArray<GameResult>,
  options?: Partial<RatingConfig>
): RatingChanges {
  const config = resolveRatingConfig(options);
  validate(players, games);

  const ctx = createRatingContext(players, games, config);
  const out: RatingChanges = Object.create(null);
  for (const name of Object.keys(players)) {
    out[name] = computeRatingChange(name, ctx);
  }
  return out;
}
