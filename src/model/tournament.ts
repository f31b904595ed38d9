// src/model/tournament.ts
// Per-player aggregation of a tournament's games.

import type {
  GameOutcome,
  GameResult,
  PlayedGame,
  PlayerMap,
  PlayerName,
  TournamentEntry,
  TournamentRecord,
} from './types';

/** Points earned by playerA (side 'A') or playerB (side 'B'). */
export function pointsFor(outcome: GameOutcome, side: 'A' | 'B'): number {
  if (outcome === 'draw') return 0.5;
  return outcome === side ? 1 : 0;
}

function emptyEntry(name: PlayerName): TournamentEntry {
  return {
    name,
    games: [],
    gamesInTournament: 0,
    score: 0,
    wins: 0,
    losses: 0,
    draws: 0,
    spread: 0,
    opponentRatings: [],
  };
}

function sideOf(g: GameResult, side: 'A' | 'B', players: Readonly<PlayerMap>): PlayedGame {
  const opponent = side === 'A' ? g.playerB : g.playerA;
  const own = side === 'A' ? g.scoreA : g.scoreB;
  const opp = side === 'A' ? g.scoreB : g.scoreA;
  const played: PlayedGame = {
    opponent,
    opponentRating: players[opponent]?.priorRating ?? null,
    points: pointsFor(g.outcome, side),
  };
  if (g.round !== undefined) played.round = g.round;
  if (own !== undefined && opp !== undefined) {
    played.ownScore = own;
    played.opponentScore = opp;
  }
  return played;
}

/**
 * Groups the games by player. Every player in `players` gets an entry, even
 * with no games; games are kept in round order (input order within a round).
 */
export function buildTournamentRecord(
  name: string,
  date: string,
  players: Readonly<PlayerMap>,
  games: ReadonlyArray<GameResult>
): TournamentRecord {
  const entries: Record<PlayerName, TournamentEntry> = Object.create(null);
  const entryFor = (pid: PlayerName): TournamentEntry =>
    (entries[pid] ||= emptyEntry(pid));

  for (const pid of Object.keys(players)) entryFor(pid);

  for (const g of games) {
    for (const side of ['A', 'B'] as const) {
      const e = entryFor(side === 'A' ? g.playerA : g.playerB);
      if (e.section === undefined && g.section !== undefined) e.section = g.section;
      e.games.push(sideOf(g, side, players));
    }
  }

  for (const e of Object.values(entries)) {
    e.games.sort((a, b) => (a.round ?? 0) - (b.round ?? 0));
    for (const pg of e.games) {
      e.score += pg.points;
      if (pg.points === 1) e.wins++;
      else if (pg.points === 0) e.losses++;
      else e.draws++;
      if (pg.ownScore !== undefined && pg.opponentScore !== undefined) {
        e.spread += pg.ownScore - pg.opponentScore;
      }
      e.opponentRatings.push(pg.opponentRating);
    }
    e.gamesInTournament = e.games.length;
  }

  return { name, date, entries };
}
