// src/standings/histogram.ts
import { ConfigError } from '../errors';
import type { Player } from '../model/types';

export interface HistogramBin {
  /** lower bound of the bin */
  from: number;
  count: number;
}

/** Buckets rated players into `interval`-wide bins, ascending. */
export function ratingHistogram(
  players: ReadonlyArray<Pick<Player, 'priorRating'>>,
  interval: number
): HistogramBin[] {
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new ConfigError(`histogram interval must be a positive integer (got ${interval})`);
  }
  const counts = new Map<number, number>();
  for (const p of players) {
    if (p.priorRating === null) continue;
    const from = interval * Math.floor(p.priorRating / interval);
    counts.set(from, (counts.get(from) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([from, count]) => ({ from, count }));
}
