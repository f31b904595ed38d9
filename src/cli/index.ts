#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { LOG_LEVEL_ENV } from '../config';
import { isRatingError } from '../errors';
import { createLogger, parseLogLevel } from '../logger';
import { nodeFileSystem } from './io';
import { buildProgram } from './program';

async function main(): Promise<void> {
  const log = createLogger(parseLogLevel(process.env[LOG_LEVEL_ENV]));
  const program = buildProgram({
    fs: nodeFileSystem,
    log,
    env: process.env,
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exitCode = isRatingError(err) ? 1 : 2;
});
