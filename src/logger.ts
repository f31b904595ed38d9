import bunyan from 'bunyan';
import { ConfigError } from './errors';

export type Logger = bunyan;

const LEVELS: ReadonlyArray<bunyan.LogLevelString> = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export function parseLogLevel(value: string | undefined): bunyan.LogLevelString {
  if (value === undefined || value.trim() === '') return 'info';
  const level = LEVELS.find((l) => l === value.trim().toLowerCase());
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LEVELS.join(', ')} (got "${value}")`);
  }
  return level;
}

/** JSON log records on stderr, so stdout stays free for command output. */
export function createLogger(
  level: bunyan.LogLevelString = 'info',
  stream: NodeJS.WritableStream = process.stderr
): Logger {
  return bunyan.createLogger({
    name: 'rerate',
    streams: [{ level, stream }],
  });
}
