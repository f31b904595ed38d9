// src/model/byes.ts
// Placeholder entrants used to fill odd-sized pairings. They are never rated.

import type { PlayerName } from './types';

export const DEFAULT_BYE_NAMES: ReadonlyArray<string> = [
  'Bye',
  'A Bye',
  'B Bye',
  'Y Bye',
  'Yy Bye',
  'Z Bye',
  'Zy Bye',
  'Zz Bye',
  'Bye One',
  'Bye Two',
  'Bye Three',
  'Bye Four',
];

/** Case-insensitive match against `byeNames`. */
export function isByeName(
  name: PlayerName,
  byeNames: ReadonlyArray<string> = DEFAULT_BYE_NAMES
): boolean {
  const key = name.trim().toLowerCase();
  return byeNames.some((b) => b.trim().toLowerCase() === key);
}
