import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { FormatError } from '../errors';
import type { Logger } from '../logger';

/** The file operations the commands need; tests pass an in-memory one. */
export interface FileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export const nodeFileSystem: FileSystem = {
  readFile: (path) => readFile(path, 'utf-8'),
  async writeFile(path, data) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data, 'utf-8');
  },
  rename: (from, to) => rename(from, to),
  remove: (path) => rm(path, { force: true }),
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR');
}

/** Reads an input file, turning "no such file" into a FormatError. */
export async function readInput(fs: FileSystem, path: string): Promise<string> {
  try {
    return await fs.readFile(path);
  } catch (err) {
    if (isMissingFile(err)) throw new FormatError('cannot open file', path);
    throw err;
  }
}

export function stagingPath(path: string): string {
  return `${path}.tmp`;
}

/**
 * Writes every file next to its target first and renames them into place
 * only once all writes succeeded. On a failed write the staged files are
 * removed and the error is rethrown.
 */
export async function writeAll(
  fs: FileSystem,
  files: ReadonlyArray<readonly [string, string]>,
  log: Logger
): Promise<void> {
  const staged: string[] = [];
  try {
    for (const [path, text] of files) {
      const tmp = stagingPath(path);
      // a failed write may still leave a partial file behind
      staged.push(tmp);
      await fs.writeFile(tmp, text);
    }
  } catch (err) {
    for (const tmp of staged) {
      await fs.remove(tmp).catch((cleanupErr: unknown) => {
        log.warn({ err: cleanupErr, path: tmp }, 'could not remove staged file');
      });
    }
    throw err;
  }

  for (const [path] of files) {
    await fs.rename(stagingPath(path), path);
    log.info({ path }, 'wrote file');
  }
}
