import { describe, it, expect } from "vitest";
import {
  ACTIVE_WINDOW_DAYS,
  activePlayers,
  applyRatingChanges,
  buildTournamentRecord,
  pointsFor,
  type GameResult,
  type PlayerMap,
} from "../../src/model";
import { computeNewRatings } from "../../src/ratings";

const players: PlayerMap = {
  Alice: { name: "Alice", priorRating: 1600, gamesPlayedLifetime: 40 },
  Bob: { name: "Bob", priorRating: 1400, gamesPlayedLifetime: 40 },
  Cara: { name: "Cara", priorRating: null, gamesPlayedLifetime: 0 },
  Dan: { name: "Dan", priorRating: 1450, gamesPlayedLifetime: 60 },
};

const games: GameResult[] = [
  { playerA: "Bob", playerB: "Cara", outcome: "draw", round: 2, scoreA: 350, scoreB: 350 },
  { playerA: "Alice", playerB: "Bob", outcome: "A", round: 1, scoreA: 450, scoreB: 400 },
  { playerA: "Cara", playerB: "Alice", outcome: "A", round: 3, scoreA: 500, scoreB: 410 },
];

describe("pointsFor", () => {
  it("scores wins, losses and draws", () => {
    expect(pointsFor("A", "A")).toBe(1);
    expect(pointsFor("A", "B")).toBe(0);
    expect(pointsFor("draw", "B")).toBe(0.5);
  });
});

describe("buildTournamentRecord", () => {
  const record = buildTournamentRecord("Club Night", "2024-03-09", players, games);

  it("tallies each player", () => {
    const bob = record.entries["Bob"];
    expect(bob).toMatchObject({ score: 0.5, wins: 0, losses: 1, draws: 1, spread: -50, gamesInTournament: 2 });
    const alice = record.entries["Alice"];
    expect(alice).toMatchObject({ score: 1, wins: 1, losses: 1, spread: -40 });
    expect(alice?.opponentRatings).toEqual([1400, null]);
  });

  it("orders games by round", () => {
    expect(record.entries["Bob"]?.games.map((g) => g.round)).toEqual([1, 2]);
    expect(record.entries["Bob"]?.games[0]).toEqual({
      round: 1,
      opponent: "Alice",
      opponentRating: 1600,
      points: 0,
      ownScore: 400,
      opponentScore: 450,
    });
  });

  it("keeps players without games", () => {
    expect(record.entries["Dan"]).toMatchObject({ gamesInTournament: 0, score: 0, games: [] });
  });
});

describe("applyRatingChanges", () => {
  it("writes new ratings back and sorts by rating then name", () => {
    const changes = computeNewRatings(players, games);
    const list = applyRatingChanges(players, changes, "2024-03-09");
    expect(list.map((p) => p.name)).toEqual(
      [...list].sort((a, b) => (b.priorRating ?? -1) - (a.priorRating ?? -1)).map((p) => p.name)
    );
    const dan = list.find((p) => p.name === "Dan");
    expect(dan).toEqual(players["Dan"]);
    const bob = list.find((p) => p.name === "Bob");
    expect(bob?.gamesPlayedLifetime).toBe(42);
    expect(bob?.lastPlayed).toBe("2024-03-09");
    expect(bob?.priorRating).toBe(changes["Bob"]?.newRating);
    expect(players["Bob"]?.priorRating).toBe(1400);
  });
});

describe("activePlayers", () => {
  it("keeps players seen after the window start", () => {
    const list = [
      { name: "Alice", priorRating: 1500, gamesPlayedLifetime: 9, lastPlayed: "2022-03-10" },
      { name: "Bob", priorRating: 1500, gamesPlayedLifetime: 9, lastPlayed: "2022-03-09" },
      { name: "Cara", priorRating: 1500, gamesPlayedLifetime: 9 },
    ];
    expect(ACTIVE_WINDOW_DAYS).toBe(731);
    expect(activePlayers(list, "2024-03-09").map((p) => p.name)).toEqual(["Alice"]);
    expect(activePlayers(list, "2024-03-09", 732).map((p) => p.name)).toEqual(["Alice", "Bob"]);
  });
});
