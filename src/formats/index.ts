// src/formats/index.ts
// Format registry: file extension → codec. No inheritance, just lookup tables.

import { extname } from 'node:path';
import { FormatError } from '../errors';
import { renderReport } from './output/report';
import { renderTable } from './output/table';
import { csvRatingList } from './ratinglist/csv';
import { datRatingList } from './ratinglist/dat';
import { csvResults } from './results/csv';
import { touResults } from './results/tou';
import type {
  OutputFormat,
  OutputRenderer,
  RatingListCodec,
  RatingListFormat,
  ResultsCodec,
  ResultsFormat,
} from './types';

export type {
  RatingListFormat,
  ResultsFormat,
  OutputFormat,
  RatingListCodec,
  ResultsCodec,
  OutputRenderer,
  ParsedResults,
  TournamentMeta,
  TournamentOutput,
} from './types';

export const RATING_LIST_FORMATS: Readonly<Record<RatingListFormat, RatingListCodec>> = {
  dat: datRatingList,
  csv: csvRatingList,
};

export const RESULTS_FORMATS: Readonly<Record<ResultsFormat, ResultsCodec>> = {
  tou: touResults,
  csv: csvResults,
};

export const OUTPUT_FORMATS: Readonly<Record<OutputFormat, OutputRenderer>> = {
  report: renderReport,
  csv: renderTable,
};

/** Fixed names of the files written for each output format. */
export const OUTPUT_FILES: Readonly<Record<OutputFormat, string>> = {
  report: 'results.txt',
  csv: 'ratings.csv',
};

function extensionOf(path: string): string {
  return extname(path).slice(1).toLowerCase();
}

function pick<K extends string>(table: Readonly<Record<K, unknown>>, path: string, what: string): K {
  const ext = extensionOf(path);
  const known = Object.keys(table);
  const hit = known.find((k): k is K => k === ext);
  if (hit === undefined) {
    const list = known.map((k) => `.${k}`).join(', ');
    throw new FormatError(`unrecognised ${what} extension "${ext ? `.${ext}` : ''}" (expected ${list})`, path);
  }
  return hit;
}

export function ratingListFormatFor(path: string): RatingListFormat {
  return pick(RATING_LIST_FORMATS, path, 'rating list');
}

export function resultsFormatFor(path: string): ResultsFormat {
  return pick(RESULTS_FORMATS, path, 'results');
}

export { parseCsv, formatCsv, formatCsvRow, type CsvRow } from './csv';
export { parseIsoDate, parseDottedDate, parseCompactDate, toDottedDate, toCompactDate } from './dates';
export { readTou, writeTou } from './results/tou';
export { readCsvResults, requireMeta } from './results/csv';
export { renderReport, formatRecord, signed } from './output/report';
export { renderTable, TABLE_HEADER } from './output/table';
export { datRatingList } from './ratinglist/dat';
export { csvRatingList } from './ratinglist/csv';
