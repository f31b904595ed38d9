// src/formats/types.ts
import type { GameResult, Player, RatingChanges, TournamentRecord } from '../model/types';
import type { SectionStandings } from '../standings/types';

export type RatingListFormat = 'dat' | 'csv';
export type ResultsFormat = 'tou' | 'csv';
export type OutputFormat = 'report' | 'csv';

export interface RatingListCodec {
  read(text: string, file: string): Player[];
  /** Players are written in the order given. */
  write(players: ReadonlyArray<Player>): string;
}

/** Name and date supplied from outside the results file. */
export interface TournamentMeta {
  name?: string;
  date?: string;
  /** placeholder names whose games count as byes; defaults to DEFAULT_BYE_NAMES */
  byeNames?: ReadonlyArray<string>;
}

export interface ParsedResults {
  tournamentName: string;
  /** ISO yyyy-mm-dd */
  date: string;
  games: GameResult[];
}

export interface ResultsCodec {
  /** false when name and date must come from TournamentMeta */
  readonly carriesMetadata: boolean;
  read(text: string, file: string, meta?: TournamentMeta): ParsedResults;
}

export interface TournamentOutput {
  record: TournamentRecord;
  changes: Readonly<RatingChanges>;
  standings: ReadonlyArray<SectionStandings>;
}

export type OutputRenderer = (out: TournamentOutput) => string;
