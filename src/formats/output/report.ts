// src/formats/output/report.ts
// Human-readable results report.

import type { PlayedGame } from '../../model/types';
import type { StandingRow } from '../../standings/types';
import type { OutputRenderer } from '../types';

interface Column {
  title: string;
  width: number;
  align: 'left' | 'right';
  cell: (r: StandingRow) => string;
}

export function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

export function formatRecord(r: Pick<StandingRow, 'wins' | 'losses' | 'draws'>): string {
  return `${r.wins + r.draws / 2}-${r.losses + r.draws / 2}`;
}

const COLUMNS: ReadonlyArray<Column> = [
  { title: 'RANK', width: 4, align: 'right', cell: (r) => String(r.rank) },
  { title: 'NAME', width: 22, align: 'left', cell: (r) => r.name },
  { title: 'RECORD', width: 9, align: 'left', cell: formatRecord },
  { title: 'SPREAD', width: 7, align: 'right', cell: (r) => signed(r.spread) },
  { title: 'OLD RAT', width: 8, align: 'right', cell: (r) => (r.oldRating === null ? '-' : String(r.oldRating)) },
  { title: 'NEW RAT', width: 8, align: 'right', cell: (r) => String(r.newRating) },
  { title: 'CHANGE', width: 7, align: 'right', cell: (r) => (r.change === null ? '-' : signed(r.change)) },
  { title: 'PERF', width: 6, align: 'right', cell: (r) => (r.performanceRating === null ? '-' : String(r.performanceRating)) },
];

function pad(text: string, c: Column): string {
  return c.align === 'left' ? text.padEnd(c.width) : text.padStart(c.width);
}

function tableLine(cells: string[]): string {
  return cells.map((text, i) => {
    const c = COLUMNS[i];
    return c ? pad(text, c) : text;
  }).join(' ').trimEnd();
}

function gameLine(g: PlayedGame, idx: number): string {
  const parts = [
    `R${g.round ?? idx + 1}`,
    g.points === 1 ? 'W' : g.points === 0 ? 'L' : 'D',
  ];
  if (g.ownScore !== undefined && g.opponentScore !== undefined) {
    parts.push(`${g.ownScore}-${g.opponentScore}`);
  }
  parts.push(`${g.opponent} (${g.opponentRating ?? 'unrated'})`);
  return `  ${parts.join('  ')}`;
}

export const renderReport: OutputRenderer = ({ record, standings }) => {
  const lines: string[] = [record.name, record.date, ''];

  for (const s of standings) {
    if (s.section !== undefined) lines.push(`Section ${s.section}`);
    lines.push(tableLine(COLUMNS.map((c) => c.title)));
    for (const row of s.rows) lines.push(tableLine(COLUMNS.map((c) => c.cell(row))));
    lines.push('');

    const unrated = s.rows.filter((r) => r.oldRating === null);
    for (const r of unrated) lines.push(`${r.name} is unrated`);
    if (unrated.length > 0) lines.push('');

    lines.push('Round results');
    for (const row of s.rows) {
      lines.push(row.name);
      const games = record.entries[row.name]?.games ?? [];
      games.forEach((g, idx) => lines.push(gameLine(g, idx)));
    }
    lines.push('');
  }

  return lines.join('\n');
};
