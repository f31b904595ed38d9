// src/formats/results/tou.ts
// .tou results files.
//
//   *M25.05.2020 Tournament Name
//   *A                                   ← section
//   Jo Bloggs 2450 +2 1380 3 ...         ← name, then (score, opponent) per round
//   *** END OF FILE ***
//
// A score's last three digits are the game score; a leading 2 marks a win
// and a leading 1 a tie. Opponents are 1-based positions in the section, a
// leading + marks who went first. Pairing a player with themselves is a bye,
// and so is a game against a placeholder entrant such as "Zz Bye".

import { FormatError } from '../../errors';
import { isByeName } from '../../model/byes';
import { outcomeFromScores } from '../../model/validate';
import type { GameResult } from '../../model/types';
import { parseDottedDate, parseIsoDate, toDottedDate } from '../dates';
import type { ParsedResults, ResultsCodec, TournamentMeta } from '../types';

const END_MARKER = '*** END OF FILE ***';
const HAS_LETTER = /[a-zA-Z]/;

interface ParsedPairing {
  score: number;
  opponent: number;
}

interface ParsedPlayerLine {
  name: string;
  line: number;
  rounds: ParsedPairing[];
}

interface ParsedSection {
  name: string;
  players: ParsedPlayerLine[];
}

function parseHeader(header: string, file: string): { name: string; date: string } {
  const m = /^\*M(\S+)\s+(.*)$/.exec(header.trim());
  if (!m) throw new FormatError('first line must be "*Mdd.mm.yyyy Tournament Name"', file, 1);
  const date = parseDottedDate(m[1] ?? '');
  if (!date) throw new FormatError(`cannot read tournament date "${m[1]}" as dd.mm.yyyy`, file, 1);
  const name = (m[2] ?? '').trim();
  if (name === '') throw new FormatError('missing tournament name', file, 1);
  return { name, date };
}

/** null for a high-score line (a name with fewer than two numbers). */
function parsePlayerLine(text: string, file: string, line: number): ParsedPlayerLine | null {
  const parts = text.split(/\s+/);
  let n = 0;
  while (n < parts.length && HAS_LETTER.test(parts[n] ?? '')) n++;
  const name = parts.slice(0, n).join(' ');
  const fields = parts.slice(n);
  if (fields.length < 2) return null;
  if (name === '') throw new FormatError('result line has no player name', file, line);
  if (fields.length % 2 !== 0) {
    throw new FormatError(`"${name}" has a score without an opponent`, file, line);
  }

  const rounds: ParsedPairing[] = [];
  for (let i = 0; i < fields.length; i += 2) {
    const score = fields[i] ?? '';
    const opp = fields[i + 1] ?? '';
    if (!/^\d+$/.test(score)) throw new FormatError(`score field is not a number: "${score}"`, file, line);
    if (!/^\+?\d+$/.test(opp)) throw new FormatError(`opponent field is not a number: "${opp}"`, file, line);
    rounds.push({ score: Number(score) % 1000, opponent: Number(opp.replace('+', '')) });
  }
  return { name, line, rounds };
}

function parseSections(lines: string[], file: string): ParsedSection[] {
  const sections: ParsedSection[] = [];
  for (let i = 1; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    if (raw.length === 0 || raw.startsWith(' ')) continue;

    const text = raw.trim();
    if (text === END_MARKER) break;
    if (text.startsWith('*')) {
      sections.push({ name: text.slice(1).trim(), players: [] });
      continue;
    }
    if (text.length < 3) continue;

    const player = parsePlayerLine(text, file, i + 1);
    if (!player) continue;
    const current = sections[sections.length - 1];
    if (!current) throw new FormatError('result line before the first section', file, i + 1);
    current.players.push(player);
  }
  return sections;
}

function sectionGames(s: ParsedSection, file: string, byeNames?: ReadonlyArray<string>): GameResult[] {
  const games: GameResult[] = [];
  const ps = s.players;
  ps.forEach((p, idx) => {
    const self = idx + 1;
    p.rounds.forEach((r, round) => {
      if (r.opponent === self) return; // bye
      const opp = ps[r.opponent - 1];
      if (!opp) {
        throw new FormatError(
          `invalid opponent number ${r.opponent} for "${p.name}" in section ${s.name}`,
          file,
          p.line
        );
      }
      const back = opp.rounds[round];
      if (!back || back.opponent !== self) {
        throw new FormatError(
          `round ${round + 1}: "${p.name}" lists "${opp.name}" as opponent but not the other way round`,
          file,
          p.line
        );
      }
      // each game appears on both lines; keep the half from the lower number
      if (self > r.opponent) return;
      // a game against a placeholder entrant is a bye too
      if (isByeName(p.name, byeNames) || isByeName(opp.name, byeNames)) return;
      games.push({
        playerA: p.name,
        playerB: opp.name,
        outcome: outcomeFromScores(r.score, back.score),
        round: round + 1,
        section: s.name,
        scoreA: r.score,
        scoreB: back.score,
      });
    });
  });
  return games;
}

function checkUniqueNames(sections: ReadonlyArray<ParsedSection>, file: string): void {
  const seen = new Set<string>();
  for (const s of sections) {
    for (const p of s.players) {
      if (seen.has(p.name)) throw new FormatError(`player "${p.name}" is listed twice`, file, p.line);
      seen.add(p.name);
    }
  }
}

export function readTou(text: string, file: string, meta?: TournamentMeta): ParsedResults {
  const lines = text.split(/\r?\n/);
  const header = parseHeader(lines[0] ?? '', file);
  const sections = parseSections(lines, file);
  checkUniqueNames(sections, file);

  const metaDate = meta?.date !== undefined ? parseIsoDate(meta.date) : null;
  return {
    tournamentName: meta?.name ?? header.name,
    date: metaDate ?? header.date,
    games: sections.flatMap((s) => sectionGames(s, file, meta?.byeNames)),
  };
}

// ---------------------------------
// Writer
// ---------------------------------

const DEFAULT_SECTION = 'A';

function scoreToken(own: number, opp: number): string {
  if (!Number.isInteger(own) || own < 0 || own > 999) {
    throw new FormatError(`game score ${own} does not fit the .tou format (0-999)`);
  }
  if (own > opp) return String(2000 + own);
  if (own === opp) return String(1000 + own);
  return String(own);
}

/** Renders results as a .tou file. Missing rounds become byes scoring 0. */
export function writeTou(results: ParsedResults): string {
  const bySection = new Map<string, GameResult[]>();
  for (const g of results.games) {
    const key = g.section ?? DEFAULT_SECTION;
    const list = bySection.get(key) ?? [];
    list.push(g);
    bySection.set(key, list);
  }

  const out = [`*M${toDottedDate(results.date)} ${results.tournamentName}`];
  for (const [section, games] of bySection) {
    out.push(`*${section}`);

    const numbers = new Map<string, number>();
    const number = (name: string): number => {
      let n = numbers.get(name);
      if (n === undefined) {
        n = numbers.size + 1;
        numbers.set(name, n);
      }
      return n;
    };
    let rounds = 0;
    for (const g of games) {
      if (g.round === undefined || !Number.isInteger(g.round) || g.round < 1) {
        throw new FormatError(`game ${g.playerA} vs ${g.playerB} has no valid round number`);
      }
      if (g.scoreA === undefined || g.scoreB === undefined) {
        throw new FormatError(`game ${g.playerA} vs ${g.playerB} has no game scores`);
      }
      number(g.playerA);
      number(g.playerB);
      rounds = Math.max(rounds, g.round);
    }

    // name → round → token pair
    const grid = new Map<string, string[]>();
    for (const name of numbers.keys()) {
      if (!name.split(' ').every((part) => HAS_LETTER.test(part))) {
        throw new FormatError(`name "${name}" cannot be written to a .tou file`);
      }
      const self = number(name);
      grid.set(name, Array.from({ length: rounds }, () => `0 ${self}`));
    }
    const place = (name: string, round: number, token: string): void => {
      const row = grid.get(name);
      if (!row) return;
      if (row[round - 1] !== `0 ${number(name)}`) {
        throw new FormatError(`"${name}" has two games in round ${round}`);
      }
      row[round - 1] = token;
    };
    for (const g of games) {
      const { round = 0, scoreA = 0, scoreB = 0 } = g;
      place(g.playerA, round, `${scoreToken(scoreA, scoreB)} ${number(g.playerB)}`);
      place(g.playerB, round, `${scoreToken(scoreB, scoreA)} ${number(g.playerA)}`);
    }

    for (const [name, cells] of grid) out.push(`${name} ${cells.join(' ')}`);
  }
  out.push(END_MARKER);
  return out.join('\n') + '\n';
}

export const touResults: ResultsCodec = {
  carriesMetadata: true,
  read: readTou,
};
