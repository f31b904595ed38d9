import { describe, it, expect } from "vitest";
import { formatRecord, renderReport, renderTable, signed, type TournamentOutput } from "../../src/formats";
import { buildTournamentRecord, type GameResult, type PlayerMap } from "../../src/model";
import { computeNewRatings } from "../../src/ratings";
import { computeStandings } from "../../src/standings";

const players: PlayerMap = {
  "Alice Ames": { name: "Alice Ames", priorRating: 1500, gamesPlayedLifetime: 50 },
  "Bob Brook": { name: "Bob Brook", priorRating: 1500, gamesPlayedLifetime: 50 },
  "Cara Cole": { name: "Cara Cole", priorRating: null, gamesPlayedLifetime: 0 },
};

const games: GameResult[] = [
  { playerA: "Alice Ames", playerB: "Bob Brook", outcome: "A", round: 1, scoreA: 450, scoreB: 380 },
  { playerA: "Cara Cole", playerB: "Alice Ames", outcome: "A", round: 2, scoreA: 400, scoreB: 350 },
];

function output(): TournamentOutput {
  const changes = computeNewRatings(players, games);
  const record = buildTournamentRecord("Spring Cup", "2024-03-09", players, games);
  return { record, changes, standings: computeStandings(record, changes) };
}

describe("renderReport", () => {
  it("prints standings, unrated players and round results", () => {
    expect(renderReport(output()).split("\n")).toEqual([
      "Spring Cup",
      "2024-03-09",
      "",
      "RANK NAME                   RECORD     SPREAD  OLD RAT  NEW RAT  CHANGE   PERF",
      "   1 Cara Cole              1-0           +50        -     2300       -   2300",
      "   2 Alice Ames             1-1           +20     1500     1500       0   1500",
      "   3 Bob Brook              0-1           -70     1500     1492      -8    700",
      "",
      "Cara Cole is unrated",
      "",
      "Round results",
      "Cara Cole",
      "  R2  W  400-350  Alice Ames (1500)",
      "Alice Ames",
      "  R1  W  450-380  Bob Brook (1500)",
      "  R2  L  350-400  Cara Cole (unrated)",
      "Bob Brook",
      "  R1  L  380-450  Alice Ames (1500)",
      "",
    ]);
  });

  it("formats records and signed numbers", () => {
    expect(formatRecord({ wins: 2, losses: 1, draws: 1 })).toBe("2.5-1.5");
    expect(signed(5)).toBe("+5");
    expect(signed(0)).toBe("0");
    expect(signed(-3)).toBe("-3");
  });
});

describe("renderTable", () => {
  it("writes one CSV row per player in standings order", () => {
    expect(renderTable(output())).toBe(
      [
        "Name,Old Rating,New Rating,Change,Games,Score,Expected Score,Performance Rating",
        "Cara Cole,,2300,,1,1,0.50,2300",
        "Alice Ames,1500,1500,0,2,1,1.00,1500",
        "Bob Brook,1500,1492,-8,1,0,0.50,700",
        "",
      ].join("\n")
    );
  });
});
