import { describe, it, expect } from "vitest";
import { readCsvResults, requireMeta } from "../../src/formats";
import { ConfigError, FormatError } from "../../src/errors";

const HEADER = "Submitted On,Round,Winner,Score,Opponent,Score";
const META = { name: "Spring Cup", date: "2024-03-09" };

describe("readCsvResults", () => {
  it("reads one game per row and skips byes", () => {
    const text = [
      HEADER,
      "2024-03-09 10:00,1,Alice Ames,450,Bob Brook,380",
      "2024-03-09 10:05,1,Cara Cole,0,Bye,0",
      ",,,,,",
      "2024-03-09 11:00,2,Cara Cole,400,Alice Ames,400",
    ].join("\n");
    expect(readCsvResults(text, "results.csv", META)).toEqual({
      tournamentName: "Spring Cup",
      date: "2024-03-09",
      games: [
        { playerA: "Alice Ames", playerB: "Bob Brook", outcome: "A", round: 1, scoreA: 450, scoreB: 380 },
        { playerA: "Cara Cole", playerB: "Alice Ames", outcome: "draw", round: 2, scoreA: 400, scoreB: 400 },
      ],
    });
  });

  it("takes the bye names from the metadata", () => {
    const text = [HEADER, "x,1,Alice Ames,450,Nobody,0", "x,2,Alice Ames,450,Bye,0"].join("\n");
    expect(readCsvResults(text, "results.csv", { ...META, byeNames: ["Nobody"] }).games).toEqual([
      { playerA: "Alice Ames", playerB: "Bye", outcome: "A", round: 2, scoreA: 450, scoreB: 0 },
    ]);
  });

  it("rejects short rows, bad rounds and a losing winner", () => {
    expect(() => readCsvResults(`${HEADER}\nx,1,Alice,450,Bob\n`, "results.csv", META)).toThrow(
      "results.csv:2: expected 6 columns, found 5"
    );
    expect(() => readCsvResults(`${HEADER}\nx,0,Alice,450,Bob,300\n`, "results.csv", META)).toThrow(
      'results.csv:2: round must be a positive whole number (got "0")'
    );
    expect(() => readCsvResults(`${HEADER}\nx,1,Alice,300,Bob,380\n`, "results.csv", META)).toThrow(
      "results.csv:2: winner Alice scored 300, less than Bob's 380"
    );
    expect(() => readCsvResults(`${HEADER}\nx,1,Alice,many,Bob,380\n`, "results.csv", META)).toThrow(FormatError);
  });
});

describe("requireMeta", () => {
  it("needs a name and an ISO date", () => {
    expect(() => requireMeta(undefined, "results.csv")).toThrow(
      "a tournament name is required to read results.csv"
    );
    expect(() => requireMeta({ name: "Cup" }, "results.csv")).toThrow(ConfigError);
    expect(() => requireMeta({ name: "Cup", date: "09.03.2024" }, "results.csv")).toThrow(
      'tournament date "09.03.2024" is not a yyyy-mm-dd date'
    );
    expect(requireMeta({ name: " Cup ", date: "2024-03-09" }, "results.csv")).toEqual({
      name: "Cup",
      date: "2024-03-09",
    });
  });
});
