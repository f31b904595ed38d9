// src/cli/convert.ts
// Spreadsheet (.csv) results → .tou file.

import { FormatError } from '../errors';
import { readCsvResults, requireMeta, resultsFormatFor, writeTou } from '../formats';
import { readInput, writeAll } from './io';
import type { CommandContext } from './rate';

export interface ConvertOptions {
  input: string;
  output: string;
  name?: string;
  date?: string;
}

export async function runConvert(opts: ConvertOptions, ctx: CommandContext): Promise<number> {
  if (resultsFormatFor(opts.input) !== 'csv') {
    throw new FormatError('input must be a .csv results file', opts.input);
  }
  if (resultsFormatFor(opts.output) !== 'tou') {
    throw new FormatError('output file does not have extension .tou', opts.output);
  }
  const meta = requireMeta({ name: opts.name, date: opts.date }, opts.input);

  const parsed = readCsvResults(await readInput(ctx.fs, opts.input), opts.input, meta);
  await writeAll(ctx.fs, [[opts.output, writeTou(parsed)]], ctx.log);
  ctx.log.debug({ path: opts.output, games: parsed.games.length }, 'converted results');
  return parsed.games.length;
}
