// src/formats/ratinglist/csv.ts
// Rating list as CSV with a header row. Columns are found by name.

import { FormatError } from '../../errors';
import type { Player } from '../../model/types';
import { formatCsv, parseCsv } from '../csv';
import { parseIsoDate } from '../dates';
import type { RatingListCodec } from '../types';

type Column = 'name' | 'rating' | 'games' | 'floor' | 'lastPlayed';

const COLUMNS: Record<Column, ReadonlyArray<string>> = {
  name: ['name'],
  rating: ['rating'],
  games: ['games', 'games played'],
  floor: ['floor', 'rating floor'],
  lastPlayed: ['last played', 'lastplayed'],
};

const COLUMN_KEYS: ReadonlyArray<Column> = ['name', 'rating', 'games', 'floor', 'lastPlayed'];

function locateColumns(headings: string[]): Partial<Record<Column, number>> {
  const norm = headings.map((h) => h.trim().toLowerCase());
  const out: Partial<Record<Column, number>> = {};
  for (const col of COLUMN_KEYS) {
    const idx = norm.findIndex((h) => COLUMNS[col].some((alias) => alias === h));
    if (idx >= 0) out[col] = idx;
  }
  return out;
}

export const csvRatingList: RatingListCodec = {
  read(text, file) {
    const [head, ...rows] = parseCsv(text, file);
    if (!head) return [];
    const cols = locateColumns(head.cells);
    if (cols.name === undefined) {
      throw new FormatError('no "Name" column in header', file, head.line);
    }
    const nameCol = cols.name;

    const cell = (cells: string[], col: Column): string => {
      const idx = cols[col];
      return idx === undefined ? '' : (cells[idx] ?? '').trim();
    };
    const count = (cells: string[], col: Column, line: number): number | null => {
      const s = cell(cells, col);
      if (s === '') return null;
      if (!/^\d+$/.test(s)) throw new FormatError(`${col} is not a whole number: "${s}"`, file, line);
      return Number(s);
    };

    return rows.map(({ line, cells }) => {
      const name = (cells[nameCol] ?? '').trim();
      if (name === '') throw new FormatError('missing player name', file, line);

      const player: Player = {
        name,
        priorRating: count(cells, 'rating', line),
        gamesPlayedLifetime: count(cells, 'games', line) ?? 0,
      };
      const floor = count(cells, 'floor', line);
      if (floor !== null) player.ratingFloor = floor;

      const last = cell(cells, 'lastPlayed');
      if (last !== '') {
        const iso = parseIsoDate(last);
        if (!iso) throw new FormatError(`last played is not a yyyy-mm-dd date: "${last}"`, file, line);
        player.lastPlayed = iso;
      }
      return player;
    });
  },

  write(players) {
    return formatCsv([
      ['Name', 'Rating', 'Games played', 'Floor', 'Last played'],
      ...players.map((p) => [
        p.name,
        p.priorRating ?? '',
        p.gamesPlayedLifetime,
        p.ratingFloor ?? '',
        p.lastPlayed ?? '',
      ]),
    ]);
  },
};
