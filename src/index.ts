// src/index.ts

// ──────────────────────────────────────────────────────────────
// Errors
// ──────────────────────────────────────────────────────────────
export {
  RatingError,
  FormatError,
  ValidationError,
  ConfigError,
  isRatingError,
  type RatingErrorKind,
} from './errors';

// ──────────────────────────────────────────────────────────────
// Canonical records (players, games, tournament tallies)
// ──────────────────────────────────────────────────────────────
export {
  validate,
  indexPlayers,
  withEntrants,
  outcomeFromScores,
  buildTournamentRecord,
  pointsFor,
  applyRatingChanges,
  activePlayers,
  ACTIVE_WINDOW_DAYS,
  isByeName,
  DEFAULT_BYE_NAMES,
  type PlayerName,
  type Player,
  type PlayerMap,
  type GameOutcome,
  type GameResult,
  type PlayedGame,
  type TournamentEntry,
  type TournamentRecord,
  type RatingMethod,
  type RatingChange,
  type RatingChanges,
} from './model';

// ──────────────────────────────────────────────────────────────
// Rating engine
// ──────────────────────────────────────────────────────────────
export {
  computeNewRatings,
  computeRatingChange,
  createRatingContext,
  expectedScore,
  performanceRating,
  roundRating,
  resolveRatingConfig,
  DEFAULT_RATING,
  DEFAULT_RATING_CONFIG,
  ROUNDING_MODES,
  type RatingConfig,
  type RatingContext,
  type RoundingMode,
} from './ratings';

// ──────────────────────────────────────────────────────────────
// Standings + histogram
// ──────────────────────────────────────────────────────────────
export {
  computeStandings,
  compareStandingRows,
  ratingHistogram,
  type StandingRow,
  type SectionStandings,
  type HistogramBin,
} from './standings';

// ──────────────────────────────────────────────────────────────
// File formats
// ──────────────────────────────────────────────────────────────
export {
  RATING_LIST_FORMATS,
  RESULTS_FORMATS,
  OUTPUT_FORMATS,
  OUTPUT_FILES,
  ratingListFormatFor,
  resultsFormatFor,
  readTou,
  writeTou,
  readCsvResults,
  renderReport,
  renderTable,
  type RatingListFormat,
  type ResultsFormat,
  type OutputFormat,
  type ParsedResults,
  type TournamentMeta,
  type TournamentOutput,
} from './formats';

// ──────────────────────────────────────────────────────────────
// Configuration + logging
// ──────────────────────────────────────────────────────────────
export { resolveConfig, parseConfigFile, readEnvConfig, type ConfigSources, type Env } from './config';
export { createLogger, parseLogLevel, type Logger } from './logger';
