// src/model/index.ts
export type {
  PlayerName,
  Player,
  PlayerMap,
  GameOutcome,
  GameResult,
  PlayedGame,
  TournamentEntry,
  TournamentRecord,
  RatingMethod,
  RatingChange,
  RatingChanges,
} from './types';

export { validate, indexPlayers, withEntrants, outcomeFromScores } from './validate';
export { buildTournamentRecord, pointsFor } from './tournament';
export { applyRatingChanges, activePlayers, ACTIVE_WINDOW_DAYS } from './apply';
export { DEFAULT_BYE_NAMES, isByeName } from './byes';
