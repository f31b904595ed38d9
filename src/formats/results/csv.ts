// src/formats/results/csv.ts
// Results exported from a spreadsheet, one game per row after a header row:
//   Submitted On, Round, Winner, Score, Opponent, Score
// The file carries no tournament name or date.

import { ConfigError, FormatError } from '../../errors';
import { isByeName } from '../../model/byes';
import type { GameResult } from '../../model/types';
import { parseCsv } from '../csv';
import { parseIsoDate } from '../dates';
import type { ParsedResults, ResultsCodec, TournamentMeta } from '../types';

const COLUMN_COUNT = 6;

/** Name and date for formats that do not carry them. Throws ConfigError. */
export function requireMeta(meta: TournamentMeta | undefined, file: string): { name: string; date: string } {
  const name = meta?.name?.trim() ?? '';
  if (name === '') throw new ConfigError(`a tournament name is required to read ${file}`);
  if (meta?.date === undefined || meta.date.trim() === '') {
    throw new ConfigError(`a tournament date is required to read ${file}`);
  }
  const date = parseIsoDate(meta.date);
  if (!date) throw new ConfigError(`tournament date "${meta.date}" is not a yyyy-mm-dd date`);
  return { name, date };
}

function parseNumber(s: string, what: string, file: string, line: number): number {
  const t = s.trim();
  if (!/^\d+(\.\d+)?$/.test(t)) throw new FormatError(`${what} is not a number: "${t}"`, file, line);
  return Number(t);
}

export function readCsvResults(text: string, file: string, meta?: TournamentMeta): ParsedResults {
  const { name, date } = requireMeta(meta, file);

  // first row is the header
  const rows = parseCsv(text, file).slice(1);
  const games: GameResult[] = [];
  for (const { line, cells } of rows) {
    if (cells.every((c) => c.trim() === '')) continue;
    if (cells.length < COLUMN_COUNT) {
      throw new FormatError(`expected ${COLUMN_COUNT} columns, found ${cells.length}`, file, line);
    }
    const [, roundCell = '', winnerCell = '', winScoreCell = '', oppCell = '', oppScoreCell = ''] = cells;
    const winner = winnerCell.trim();
    const opponent = oppCell.trim();
    if (winner === '' || opponent === '') throw new FormatError('missing player name', file, line);
    if (isByeName(winner, meta?.byeNames) || isByeName(opponent, meta?.byeNames)) continue;

    const round = parseNumber(roundCell, 'round', file, line);
    if (!Number.isInteger(round) || round < 1) {
      throw new FormatError(`round must be a positive whole number (got "${roundCell.trim()}")`, file, line);
    }
    const scoreA = parseNumber(winScoreCell, 'winner score', file, line);
    const scoreB = parseNumber(oppScoreCell, 'opponent score', file, line);
    if (scoreA < scoreB) {
      throw new FormatError(
        `winner ${winner} scored ${scoreA}, less than ${opponent}'s ${scoreB}`,
        file,
        line
      );
    }

    games.push({
      playerA: winner,
      playerB: opponent,
      outcome: scoreA === scoreB ? 'draw' : 'A',
      round,
      scoreA,
      scoreB,
    });
  }
  return { tournamentName: name, date, games };
}

export const csvResults: ResultsCodec = {
  carriesMetadata: false,
  read: readCsvResults,
};
