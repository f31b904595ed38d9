// src/config/configFile.ts
// JSON config file holding any subset of the rating constants.

import { ConfigError } from '../errors';
import { NUMERIC_KEYS, isRoundingMode } from '../ratings/config';
import type { RatingConfig } from '../ratings/types';

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

/** Parses the file's text. Unknown keys and wrongly typed values are errors. */
export function parseConfigFile(text: string, path: string): Partial<RatingConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${path} is not valid JSON: ${reason}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${path} must hold a JSON object`);
  }

  const out: Partial<RatingConfig> = {};
  for (const [key, value] of Object.entries(parsed)) {
    const numeric = NUMERIC_KEYS.find((k) => k === key);
    if (numeric !== undefined) {
      if (typeof value !== 'number') {
        throw new ConfigError(`${path}: ${key} must be a number`);
      }
      out[numeric] = value;
    } else if (key === 'rounding') {
      if (typeof value !== 'string' || !isRoundingMode(value)) {
        throw new ConfigError(`${path}: rounding must be "half-even" or "half-up"`);
      }
      out.rounding = value;
    } else {
      throw new ConfigError(`${path}: unknown setting "${key}"`);
    }
  }
  return out;
}
