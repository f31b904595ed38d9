// src/standings/types.ts
import type { PlayerName, RatingMethod } from '../model/types';

export interface StandingRow {
  rank: number;
  name: PlayerName;
  section?: string;
  wins: number;
  losses: number;
  draws: number;
  score: number;
  spread: number;
  gamesPlayed: number;
  oldRating: number | null;
  newRating: number;
  change: number | null;
  performanceRating: number | null;
  expectedScore: number;
  method: RatingMethod;
}

export interface SectionStandings {
  /** undefined for results that carry no sections */
  section?: string;
  rows: StandingRow[];
}
