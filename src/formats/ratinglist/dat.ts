// src/formats/ratinglist/dat.ts
// Fixed-width rating list:
//   [0,9) nickname  [9,29) name  [29,34) games  [34,39) rating  [40,48) yyyymmdd
// Hand-edited lists sometimes shift the date a column either way or swap
// day and month; those are still read.

import { FormatError } from '../../errors';
import type { Player } from '../../model/types';
import { parseCompactDate, toCompactDate } from '../dates';
import type { RatingListCodec } from '../types';

const NAME_WIDTH = 20;
const DATE_COLUMNS: ReadonlyArray<number> = [40, 39, 41];
const DATE_ORDERS = ['ymd', 'ydm'] as const;

function parseCount(field: string, what: string, file: string, line: number): number | null {
  const s = field.trim();
  if (s === '') return null;
  if (!/^\d+$/.test(s)) throw new FormatError(`${what} is not a number: "${s}"`, file, line);
  return Number(s);
}

function readLastPlayed(row: string, file: string, line: number): string | undefined {
  const field = row.slice(39, 49).trim();
  if (field === '') return undefined;
  for (const col of DATE_COLUMNS) {
    for (const order of DATE_ORDERS) {
      const iso = parseCompactDate(row.slice(col, col + 8), order);
      if (iso) return iso;
    }
  }
  throw new FormatError(`last played is not a yyyymmdd date: "${field}"`, file, line);
}

function readRow(row: string, file: string, line: number): Player {
  const name = row.slice(9, 29).trim();
  if (name === '') throw new FormatError('missing player name', file, line);

  const player: Player = {
    name,
    gamesPlayedLifetime: parseCount(row.slice(29, 34), 'game count', file, line) ?? 0,
    priorRating: parseCount(row.slice(34, 39), 'rating', file, line),
  };
  const lastPlayed = readLastPlayed(row, file, line);
  if (lastPlayed !== undefined) player.lastPlayed = lastPlayed;
  return player;
}

function header(): string {
  return 'NICK'.padEnd(9) + 'Name'.padEnd(NAME_WIDTH) + 'Games' + ' Rat' + '  Lastplayed';
}

function writeRow(p: Player): string {
  if (p.name.length > NAME_WIDTH) {
    throw new FormatError(`name "${p.name}" is longer than ${NAME_WIDTH} characters`);
  }
  const rating = p.priorRating === null ? '' : String(p.priorRating);
  const last = p.lastPlayed ? toCompactDate(p.lastPlayed) : '';
  const row =
    ''.padEnd(9) +
    p.name.padEnd(NAME_WIDTH) +
    String(p.gamesPlayedLifetime).padStart(5) +
    rating.padStart(5) +
    ' ' +
    last;
  return row.trimEnd();
}

export const datRatingList: RatingListCodec = {
  read(text, file) {
    const lines = text.split(/\r?\n/);
    const players: Player[] = [];
    // first line holds the column headings
    for (let i = 1; i < lines.length; i++) {
      const row = lines[i] ?? '';
      if (row.trim() === '') continue;
      players.push(readRow(row, file, i + 1));
    }
    return players;
  },

  write(players) {
    return [header(), ...players.map(writeRow)].join('\n') + '\n';
  },
};
