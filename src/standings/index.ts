// src/standings/index.ts
export type { StandingRow, SectionStandings } from './types';
export { computeStandings, compareStandingRows } from './standings';
export { ratingHistogram, type HistogramBin } from './histogram';
