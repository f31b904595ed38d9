// src/cli/histogram.ts
import { RATING_LIST_FORMATS, ratingListFormatFor } from '../formats';
import { ratingHistogram } from '../standings';
import { readInput } from './io';
import type { CommandContext } from './rate';

export interface HistogramOptions {
  ratingList: string;
  interval: number;
}

/** `bin<TAB>count` lines, lowest bin first. */
export async function runHistogram(opts: HistogramOptions, ctx: CommandContext): Promise<string[]> {
  const codec = RATING_LIST_FORMATS[ratingListFormatFor(opts.ratingList)];
  const players = codec.read(await readInput(ctx.fs, opts.ratingList), opts.ratingList);
  ctx.log.debug({ path: opts.ratingList, players: players.length }, 'read rating list');
  return ratingHistogram(players, opts.interval).map((b) => `${b.from}\t${b.count}`);
}
