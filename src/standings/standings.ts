// src/standings/standings.ts
// Final standings: score → spread → new rating → name.

import type { RatingChanges, TournamentRecord } from '../model/types';
import type { SectionStandings, StandingRow } from './types';

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareStandingRows(a: StandingRow, b: StandingRow): number {
  if (b.score !== a.score) return b.score - a.score;
  if (b.spread !== a.spread) return b.spread - a.spread;
  if (b.newRating !== a.newRating) return b.newRating - a.newRating;
  return byName(a.name, b.name);
}

/**
 * Rows grouped by section, sections in order of first appearance.
 * Players without a RatingChange are left out.
 */
export function computeStandings(
  record: TournamentRecord,
  changes: Readonly<RatingChanges>
): SectionStandings[] {
  const sections: SectionStandings[] = [];
  const bySection = new Map<string | undefined, SectionStandings>();

  for (const entry of Object.values(record.entries)) {
    const rc = changes[entry.name];
    if (!rc) continue;

    let group = bySection.get(entry.section);
    if (!group) {
      group = entry.section === undefined ? { rows: [] } : { section: entry.section, rows: [] };
      bySection.set(entry.section, group);
      sections.push(group);
    }

    const row: StandingRow = {
      rank: 0,
      name: entry.name,
      wins: entry.wins,
      losses: entry.losses,
      draws: entry.draws,
      score: entry.score,
      spread: entry.spread,
      gamesPlayed: entry.gamesInTournament,
      oldRating: rc.oldRating,
      newRating: rc.newRating,
      change: rc.change,
      performanceRating: rc.performanceRating,
      expectedScore: rc.expectedScore,
      method: rc.method,
    };
    if (entry.section !== undefined) row.section = entry.section;
    group.rows.push(row);
  }

  for (const s of sections) {
    s.rows.sort(compareStandingRows);
    s.rows.forEach((r, idx) => (r.rank = idx + 1));
  }
  return sections;
}
