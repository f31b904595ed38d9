// src/model/types.ts
// Canonical in-memory records. No file-format knowledge lives here.

export type PlayerName = string;

export interface Player {
  name: PlayerName;
  /** null when the player has no rating yet */
  priorRating: number | null;
  gamesPlayedLifetime: number;
  /** Per-player minimum carried by some rating lists. */
  ratingFloor?: number;
  /** ISO yyyy-mm-dd, provenance only. */
  lastPlayed?: string;
}

export type PlayerMap = Record<PlayerName, Player>;

/** Who won: playerA, playerB, or nobody. */
export type GameOutcome = 'A' | 'B' | 'draw';

export interface GameResult {
  playerA: PlayerName;
  playerB: PlayerName;
  outcome: GameOutcome;
  round?: number;
  section?: string;
  // game points (e.g. a board score); only used for spread and reports
  scoreA?: number;
  scoreB?: number;
}

/** One game seen from one side. */
export interface PlayedGame {
  round?: number;
  opponent: PlayerName;
  opponentRating: number | null;
  points: number;
  ownScore?: number;
  opponentScore?: number;
}

export interface TournamentEntry {
  name: PlayerName;
  section?: string;
  games: PlayedGame[];
  gamesInTournament: number;
  score: number;
  wins: number;
  losses: number;
  draws: number;
  spread: number;
  opponentRatings: Array<number | null>;
}

export interface TournamentRecord {
  name: string;
  /** ISO yyyy-mm-dd */
  date: string;
  entries: Record<PlayerName, TournamentEntry>;
}

export type RatingMethod = 'update' | 'performance' | 'unchanged';

export interface RatingChange {
  name: PlayerName;
  oldRating: number | null;
  newRating: number;
  /** newRating - oldRating; null for unrated entrants */
  change: number | null;
  performanceRating: number | null;
  expectedScore: number;
  actualScore: number;
  gamesPlayed: number;
  provisional: boolean;
  /** null when the rating came straight from the performance rating */
  kFactor: number | null;
  method: RatingMethod;
}

export type RatingChanges = Record<PlayerName, RatingChange>;
