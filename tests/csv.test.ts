import test from "node:test";
import assert from "node:assert/strict";
import { parseCsvRecords, parseGameCsv, parseSeedRatings } from "../lib/csv";

const HEADER =
  "match_id,game_id,match_date,team1_name,team2_name,partner1,partner2,opponent1,opponent2,team1_points,team2_points";

test("match CSV rows become games and forfeits are set aside", () => {
  const text = [
    HEADER,
    "101,1,2024-10-01,Net Gains,Kitchen Crew,Ana,Ben,Cal,Dee,11,7",
    "101,2,2024-10-01,Net Gains,Kitchen Crew,Ana,Ben,DEFAULT,DEFAULT,11,0",
    "",
    '101,3,2024-10-01,Net Gains,"Kitchen, Crew",Ana,Ben,Cal,Dee, 6 ,11'
  ].join("\n");

  const store = parseGameCsv(text);

  assert.equal(store.games.length, 2);
  assert.deepEqual(store.games[1].teamA, { name: "Net Gains", player1: "Ana", player2: "Ben", points: 6 });
  assert.equal(store.games[1].teamB.name, "Kitchen, Crew");
  assert.deepEqual(store.skipped, [{ rowNumber: 3, matchId: "101", gameId: "2", reason: "forfeit" }]);
});

test("header-only CSV has no records", () => {
  assert.deepEqual(parseCsvRecords(`${HEADER}\n`), []);
  assert.deepEqual(parseGameCsv(HEADER), { games: [], skipped: [] });
});

test("seed ratings are read from Player,Rating columns", () => {
  const ratings = parseSeedRatings("Player,Rating\nAna,3.8\nBen,4.125\n");

  assert.deepEqual(
    ratings,
    new Map([
      ["Ana", 3.8],
      ["Ben", 4.125]
    ])
  );
});

test("seed ratings with a non-numeric value are rejected", () => {
  assert.throws(() => parseSeedRatings("Player,Rating\nAna,high\n"), /Seed ratings row 2: Rating:/);
});
