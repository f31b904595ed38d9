// src/model/apply.ts
import type { Player, PlayerMap, RatingChanges } from './types';

/**
 * The rating list after the tournament: new ratings, lifetime games bumped,
 * last-played set for everyone who played. Sorted by rating, then name.
 * Input players are left untouched.
 */
export function applyRatingChanges(
  players: Readonly<PlayerMap>,
  changes: Readonly<RatingChanges>,
  date: string
): Player[] {
  const out: Player[] = [];
  for (const p of Object.values(players)) {
    const rc = changes[p.name];
    if (!rc || rc.gamesPlayed === 0) {
      out.push({ ...p });
      continue;
    }
    out.push({
      ...p,
      priorRating: rc.newRating,
      gamesPlayedLifetime: p.gamesPlayedLifetime + rc.gamesPlayed,
      lastPlayed: date,
    });
  }
  return out.sort((a, b) => {
    const ra = a.priorRating ?? -1;
    const rb = b.priorRating ?? -1;
    if (rb !== ra) return rb - ra;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });
}

/** Players count as active when they played within this many days. */
export const ACTIVE_WINDOW_DAYS = 731;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Keeps the players whose last game is less than `windowDays` before `date`.
 * Players without a last-played date are inactive.
 */
export function activePlayers(
  players: ReadonlyArray<Player>,
  date: string,
  windowDays: number = ACTIVE_WINDOW_DAYS
): Player[] {
  const cutoff = Date.parse(date) - windowDays * DAY_MS;
  return players.filter((p) => p.lastPlayed !== undefined && Date.parse(p.lastPlayed) > cutoff);
}
