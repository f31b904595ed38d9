import { Writable } from "node:stream";
import type { FileSystem } from "../../src/cli/io";
import type { CommandContext } from "../../src/cli/rate";
import { createLogger } from "../../src/logger";

export interface MemoryFileSystem extends FileSystem {
  files: Map<string, string>;
  writes: string[];
  /** makes every write to a path matching this fail with EACCES */
  failWrites?: (path: string) => boolean;
}

export function memoryFs(initial: Record<string, string>): MemoryFileSystem {
  const files = new Map(Object.entries(initial));
  const writes: string[] = [];
  const fs: MemoryFileSystem = {
    files,
    writes,
    async readFile(path) {
      const text = files.get(path);
      if (text === undefined) {
        throw Object.assign(new Error(`ENOENT: no such file, open '${path}'`), { code: "ENOENT" });
      }
      return text;
    },
    async writeFile(path, data) {
      if (fs.failWrites?.(path)) {
        throw Object.assign(new Error(`EACCES: permission denied, open '${path}'`), { code: "EACCES" });
      }
      writes.push(path);
      files.set(path, data);
    },
    async rename(from, to) {
      const text = files.get(from);
      if (text === undefined) throw Object.assign(new Error(`ENOENT: ${from}`), { code: "ENOENT" });
      files.delete(from);
      files.set(to, text);
    },
    async remove(path) {
      files.delete(path);
    },
  };
  return fs;
}

export interface LogRecord {
  level: number;
  msg: string;
  [field: string]: unknown;
}

export function testContext(
  initial: Record<string, string>,
  env: Record<string, string> = {}
): CommandContext & { fs: MemoryFileSystem; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      for (const line of String(chunk).split("\n")) {
        if (line.trim() !== "") records.push(JSON.parse(line));
      }
      callback();
    },
  });
  return { fs: memoryFs(initial), log: createLogger("debug", stream), env, records };
}
