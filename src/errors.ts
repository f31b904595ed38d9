// src/errors.ts
// Error taxonomy shared by the adapters, the validator and the CLI.

export type RatingErrorKind = 'format' | 'validation' | 'config';

export abstract class RatingError extends Error {
  abstract readonly kind: RatingErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or unrecognised input file. */
export class FormatError extends RatingError {
  readonly kind = 'format' as const;

  constructor(
    message: string,
    readonly file?: string,
    readonly line?: number
  ) {
    super(FormatError.locate(message, file, line));
  }

  private static locate(message: string, file?: string, line?: number): string {
    if (file === undefined) return message;
    return line === undefined ? `${file}: ${message}` : `${file}:${line}: ${message}`;
  }
}

/** Cross-reference or consistency failure in the canonical records. */
export class ValidationError extends RatingError {
  readonly kind = 'validation' as const;
}

/** Missing or invalid configuration. */
export class ConfigError extends RatingError {
  readonly kind = 'config' as const;
}

export function isRatingError(err: unknown): err is RatingError {
  return err instanceof RatingError;
}
