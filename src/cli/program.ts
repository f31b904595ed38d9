// src/cli/program.ts
import { Command, InvalidArgumentError } from 'commander';
import { isRatingError } from '../errors';
import { OUTPUT_FILES } from '../formats';
import { runConvert } from './convert';
import { runHistogram } from './histogram';
import { runRate, type CommandContext } from './rate';

export interface ProgramDeps extends CommandContext {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  setExitCode: (code: number) => void;
}

function parseNameList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s !== '');
}

function parseInterval(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('must be a positive whole number');
  return n;
}

export function buildProgram(deps: ProgramDeps): Command {
  const program = new Command();

  const guarded = async (fn: () => Promise<void>): Promise<void> => {
    try {
      await fn();
    } catch (err) {
      if (!isRatingError(err)) throw err;
      deps.log.error({ kind: err.kind }, err.message);
      deps.stderr(`Error: ${err.message}`);
      deps.setExitCode(1);
    }
  };

  program
    .name('rerate')
    .description('Norwegian-system rating updates for tournament results')
    .version('0.1.0', '-v, --version');

  program
    .command('rate')
    .description(`Rate a tournament and write ${OUTPUT_FILES.report} and ${OUTPUT_FILES.csv}`)
    .requiredOption('-r, --ratings <file>', 'prior rating list (.dat or .csv)')
    .requiredOption('-t, --results <file>', 'tournament results (.tou or .csv)')
    .option('-n, --name <name>', 'tournament name (required for .csv results)')
    .option('-d, --date <yyyy-mm-dd>', 'tournament date (required for .csv results)')
    .option('-o, --out-dir <dir>', 'directory for the output files', '.')
    .option('--rating-list-out <file>', 'also write the updated rating list (.dat or .csv)')
    .option('--active-list-out <file>', 'also write the updated list of recently active players')
    .option('--bye-names <names>', 'comma-separated placeholder entrants whose games are byes', parseNameList)
    .option('-c, --config <file>', 'JSON file with rating constants')
    .action(async (opts: {
      ratings: string;
      results: string;
      name?: string;
      date?: string;
      outDir: string;
      ratingListOut?: string;
      activeListOut?: string;
      byeNames?: string[];
      config?: string;
    }) => {
      await guarded(async () => {
        const summary = await runRate(opts, deps);
        deps.stdout(
          `Rated ${summary.players} players over ${summary.games} games in ${summary.tournamentName} (${summary.date})`
        );
        for (const path of summary.written) deps.stdout(`Wrote ${path}`);
      });
    });

  program
    .command('convert <input> <output>')
    .description('Convert spreadsheet .csv results to a .tou file')
    .option('-n, --name <name>', 'tournament name')
    .option('-d, --date <yyyy-mm-dd>', 'tournament date')
    .action(async (input: string, output: string, opts: { name?: string; date?: string }) => {
      await guarded(async () => {
        const games = await runConvert({ input, output, ...opts }, deps);
        deps.stdout(`Wrote ${games} games to ${output}`);
      });
    });

  program
    .command('histogram <ratingList>')
    .description('Count players per rating band')
    .option('-i, --interval <points>', 'band width', parseInterval, 100)
    .action(async (ratingList: string, opts: { interval: number }) => {
      await guarded(async () => {
        const lines = await runHistogram({ ratingList, interval: opts.interval }, deps);
        for (const line of lines) deps.stdout(line);
      });
    });

  return program;
}
