// src/formats/output/table.ts
// Machine-readable results: one CSV row per player, in standings order.

import { formatCsv } from '../csv';
import type { OutputRenderer } from '../types';

export const TABLE_HEADER = [
  'Name',
  'Old Rating',
  'New Rating',
  'Change',
  'Games',
  'Score',
  'Expected Score',
  'Performance Rating',
] as const;

export const renderTable: OutputRenderer = ({ standings }) => {
  const rows = standings.flatMap((s) => s.rows).map((r) => [
    r.name,
    r.oldRating ?? '',
    r.newRating,
    r.change ?? '',
    r.gamesPlayed,
    r.score,
    r.expectedScore.toFixed(2),
    r.performanceRating ?? '',
  ]);
  return formatCsv([[...TABLE_HEADER], ...rows]);
};
