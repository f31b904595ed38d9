// src/model/validate.ts
// Single rejection point for malformed canonical input.

import { ValidationError } from '../errors';
import type { GameOutcome, GameResult, Player, PlayerMap, PlayerName } from './types';

const OUTCOMES: ReadonlyArray<GameOutcome> = ['A', 'B', 'draw'];

function isNonNegativeInteger(x: number): boolean {
  return Number.isInteger(x) && x >= 0;
}

function describeGame(g: GameResult, idx: number): string {
  const where = g.round !== undefined ? ` (round ${g.round})` : '';
  return `game #${idx + 1} ${g.playerA} vs ${g.playerB}${where}`;
}

/** Outcome implied by the two game scores. */
export function outcomeFromScores(scoreA: number, scoreB: number): GameOutcome {
  if (scoreA > scoreB) return 'A';
  if (scoreB > scoreA) return 'B';
  return 'draw';
}

function validatePlayer(key: PlayerName, p: Player): void {
  if (p.name !== key) {
    throw new ValidationError(`player entry "${key}" carries the name "${p.name}"`);
  }
  if (p.priorRating !== null && !isNonNegativeInteger(p.priorRating)) {
    throw new ValidationError(
      `player "${p.name}" has an invalid prior rating ${p.priorRating} (expected a non-negative integer)`
    );
  }
  if (!isNonNegativeInteger(p.gamesPlayedLifetime)) {
    throw new ValidationError(
      `player "${p.name}" has an invalid lifetime game count ${p.gamesPlayedLifetime}`
    );
  }
  if (p.ratingFloor !== undefined && !isNonNegativeInteger(p.ratingFloor)) {
    throw new ValidationError(`player "${p.name}" has an invalid rating floor ${p.ratingFloor}`);
  }
}

function validateGame(players: Readonly<PlayerMap>, g: GameResult, idx: number): void {
  const label = describeGame(g, idx);
  for (const name of [g.playerA, g.playerB]) {
    if (!Object.prototype.hasOwnProperty.call(players, name)) {
      throw new ValidationError(`${label}: unknown player "${name}"`);
    }
  }
  if (g.playerA === g.playerB) {
    throw new ValidationError(`${label}: a player cannot play themselves`);
  }
  if (!OUTCOMES.includes(g.outcome)) {
    throw new ValidationError(`${label}: unknown outcome "${String(g.outcome)}"`);
  }

  const { scoreA, scoreB } = g;
  if (scoreA === undefined && scoreB === undefined) return;
  if (scoreA === undefined || scoreB === undefined) {
    throw new ValidationError(`${label}: only one side has a game score`);
  }
  for (const s of [scoreA, scoreB]) {
    if (!Number.isFinite(s) || s < 0) {
      throw new ValidationError(`${label}: impossible game score ${s}`);
    }
  }
  const implied = outcomeFromScores(scoreA, scoreB);
  if (implied !== g.outcome) {
    throw new ValidationError(
      `${label}: score ${scoreA}-${scoreB} contradicts outcome "${g.outcome}"`
    );
  }
}

/**
 * Checks the player map and games before the engine runs.
 * Throws ValidationError on the first problem found.
 */
export function validate(
  players: Readonly<PlayerMap>,
  games: ReadonlyArray<GameResult>
): void {
  for (const key of Object.keys(players)) {
    const p = players[key];
    if (!p) continue;
    validatePlayer(key, p);
  }
  games.forEach((g, idx) => validateGame(players, g, idx));
}

/** Builds a name → Player map, rejecting duplicate names. */
export function indexPlayers(list: ReadonlyArray<Player>): PlayerMap {
  const out: PlayerMap = Object.create(null);
  for (const p of list) {
    if (Object.prototype.hasOwnProperty.call(out, p.name)) {
      throw new ValidationError(`duplicate player name "${p.name}"`);
    }
    out[p.name] = p;
  }
  return out;
}

/**
 * Returns a new map in which every player named in the games but missing
 * from the rating list is present as an unrated newcomer.
 */
export function withEntrants(
  players: Readonly<PlayerMap>,
  games: ReadonlyArray<GameResult>
): PlayerMap {
  const out: PlayerMap = Object.assign(Object.create(null), players);
  for (const g of games) {
    for (const name of [g.playerA, g.playerB]) {
      if (!Object.prototype.hasOwnProperty.call(out, name)) {
        out[name] = { name, priorRating: null, gamesPlayedLifetime: 0 };
      }
    }
  }
  return out;
}
