// src/cli/rate.ts
// Orchestrates one rating run: read → validate → rate → render → write.

import { join } from 'node:path';
import { parseConfigFile, resolveConfig, type Env } from '../config';
import { ConfigError } from '../errors';
import {
  OUTPUT_FILES,
  OUTPUT_FORMATS,
  RATING_LIST_FORMATS,
  RESULTS_FORMATS,
  ratingListFormatFor,
  resultsFormatFor,
  requireMeta,
  parseIsoDate,
  type OutputFormat,
  type TournamentMeta,
} from '../formats';
import type { Logger } from '../logger';
import {
  DEFAULT_BYE_NAMES,
  activePlayers,
  applyRatingChanges,
  buildTournamentRecord,
  indexPlayers,
  isByeName,
  withEntrants,
  type GameResult,
  type PlayerMap,
} from '../model';
import { computeNewRatings, type RatingConfig } from '../ratings';
import { computeStandings } from '../standings';
import { readInput, writeAll, type FileSystem } from './io';

export interface RateOptions {
  ratings: string;
  results: string;
  name?: string;
  date?: string;
  outDir?: string;
  ratingListOut?: string;
  /** updated list limited to players active within ACTIVE_WINDOW_DAYS */
  activeListOut?: string;
  config?: string;
  /** placeholder entrants; defaults to DEFAULT_BYE_NAMES */
  byeNames?: ReadonlyArray<string>;
}

export interface CommandContext {
  fs: FileSystem;
  log: Logger;
  env: Env;
}

export interface RateSummary {
  tournamentName: string;
  date: string;
  players: number;
  games: number;
  newcomers: string[];
  written: string[];
}

export async function loadRatingConfig(
  configPath: string | undefined,
  ctx: CommandContext
): Promise<RatingConfig> {
  if (configPath === undefined) return resolveConfig({ env: ctx.env });
  const values = parseConfigFile(await readInput(ctx.fs, configPath), configPath);
  ctx.log.debug({ path: configPath }, 'loaded config file');
  return resolveConfig({ file: { path: configPath, values }, env: ctx.env });
}

function participants(players: Readonly<PlayerMap>, games: ReadonlyArray<GameResult>): PlayerMap {
  const out: PlayerMap = Object.create(null);
  for (const g of games) {
    for (const name of [g.playerA, g.playerB]) {
      const p = players[name];
      if (p) out[name] = p;
    }
  }
  return out;
}

export async function runRate(opts: RateOptions, ctx: CommandContext): Promise<RateSummary> {
  const { fs, log } = ctx;
  const config = await loadRatingConfig(opts.config, ctx);

  const listFormat = ratingListFormatFor(opts.ratings);
  const resultsFormat = resultsFormatFor(opts.results);
  const resultsCodec = RESULTS_FORMATS[resultsFormat];
  const listOutFormat =
    opts.ratingListOut === undefined ? undefined : ratingListFormatFor(opts.ratingListOut);
  const activeOutFormat =
    opts.activeListOut === undefined ? undefined : ratingListFormatFor(opts.activeListOut);
  const byeNames = opts.byeNames ?? DEFAULT_BYE_NAMES;

  if (opts.date !== undefined && !parseIsoDate(opts.date)) {
    throw new ConfigError(`tournament date "${opts.date}" is not a yyyy-mm-dd date`);
  }
  const meta: TournamentMeta = { name: opts.name, date: opts.date, byeNames };
  // formats without inline metadata fail here, before any parsing
  if (!resultsCodec.carriesMetadata) requireMeta(meta, opts.results);

  log.info({ path: opts.ratings, format: listFormat }, 'reading rating list');
  const list = RATING_LIST_FORMATS[listFormat].read(await readInput(fs, opts.ratings), opts.ratings);
  const rated = indexPlayers(list);

  log.info({ path: opts.results, format: resultsFormat }, 'reading results');
  const parsed = resultsCodec.read(await readInput(fs, opts.results), opts.results, meta);

  const players = withEntrants(rated, parsed.games);
  const newcomers = Object.keys(players).filter((name) => !(name in rated));
  if (newcomers.length > 0) log.info({ newcomers }, 'players missing from the rating list start unrated');

  const changes = computeNewRatings(players, parsed.games, config);
  const record = buildTournamentRecord(
    parsed.tournamentName,
    parsed.date,
    participants(players, parsed.games),
    parsed.games
  );
  const standings = computeStandings(record, changes);
  log.debug({ players: Object.keys(record.entries).length, games: parsed.games.length }, 'rated tournament');

  // render everything before the first write
  const outDir = opts.outDir ?? '.';
  const files: Array<[string, string]> = [];
  const outputs: ReadonlyArray<OutputFormat> = ['report', 'csv'];
  for (const format of outputs) {
    files.push([join(outDir, OUTPUT_FILES[format]), OUTPUT_FORMATS[format]({ record, changes, standings })]);
  }
  const updated = applyRatingChanges(players, changes, parsed.date).filter((p) => !isByeName(p.name, byeNames));
  if (opts.ratingListOut !== undefined && listOutFormat !== undefined) {
    files.push([opts.ratingListOut, RATING_LIST_FORMATS[listOutFormat].write(updated)]);
  }
  if (opts.activeListOut !== undefined && activeOutFormat !== undefined) {
    const active = activePlayers(updated, parsed.date);
    log.debug({ active: active.length, listed: updated.length }, 'filtered active players');
    files.push([opts.activeListOut, RATING_LIST_FORMATS[activeOutFormat].write(active)]);
  }

  await writeAll(fs, files, log);

  return {
    tournamentName: parsed.tournamentName,
    date: parsed.date,
    players: Object.keys(record.entries).length,
    games: parsed.games.length,
    newcomers,
    written: files.map(([path]) => path),
  };
}
