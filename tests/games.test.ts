import test from "node:test";
import assert from "node:assert/strict";
import { buildGameStore, firstTeamByPlayer, isForfeit, parseGameRecord, sortChronologically } from "../lib/games";
import { cleanName } from "../lib/schemas";
import type { GameRecord } from "../lib/types";
import { makeGame, makeRecord } from "./helpers";

test("valid record becomes a game with two named teams", () => {
  const parsed = parseGameRecord(makeRecord(), 2);

  assert.equal(parsed.status, "accepted");
  if (parsed.status !== "accepted") {
    return;
  }

  assert.deepEqual(parsed.game, {
    matchId: "m1",
    gameId: "1",
    matchDate: "2024-09-10",
    teamA: { name: "Dinks", player1: "Ana", player2: "Ben", points: 11 },
    teamB: { name: "Lobs", player1: "Cal", player2: "Dee", points: 7 }
  });
});

test("forfeit sentinel in any player slot skips the record", () => {
  for (const slot of ["partner1", "partner2", "opponent1", "opponent2"] as const) {
    const overrides: Partial<GameRecord> = {};
    overrides[slot] = "DEFAULT";
    const parsed = parseGameRecord(makeRecord(overrides), 5);
    assert.deepEqual(parsed, {
      status: "skipped",
      skipped: { rowNumber: 5, matchId: "m1", gameId: "1", reason: "forfeit" }
    });
  }
});

test("forfeit is detected before the date is validated", () => {
  const parsed = parseGameRecord(makeRecord({ opponent2: "DEFAULT", match_date: "not-a-date" }), 2);
  assert.equal(parsed.status, "skipped");
});

test("non-numeric or empty scores skip the record", () => {
  const letters = parseGameRecord(makeRecord({ team2_points: "abc" }), 2);
  const empty = parseGameRecord(makeRecord({ team1_points: "" }), 3);

  assert.deepEqual(letters, {
    status: "skipped",
    skipped: { rowNumber: 2, matchId: "m1", gameId: "1", reason: "unparseable_score" }
  });
  assert.equal(empty.status, "skipped");
});

test("tied and negative scores are rejected", () => {
  assert.throws(() => parseGameRecord(makeRecord({ team1_points: "9", team2_points: "9" }), 4), /Row 4: tied score 9-9/);
  assert.throws(() => parseGameRecord(makeRecord({ team1_points: "-1" }), 4), /scores must be non-negative/);
});

test("impossible or malformed dates are rejected", () => {
  assert.throws(() => parseGameRecord(makeRecord({ match_date: "2024-02-30" }), 2), /invalid match_date/);
  assert.throws(() => parseGameRecord(makeRecord({ match_date: "09/10/2024" }), 2), /invalid match_date/);
});

test("missing required fields are rejected", () => {
  assert.throws(() => parseGameRecord(makeRecord({ partner1: "  " }), 7), /Row 7: missing required fields \(partner1:/);

  const { match_id: _omitted, ...withoutMatchId } = makeRecord();
  assert.throws(() => parseGameRecord(withoutMatchId, 2), /match_id/);
});

test("a player slot holding only zero-width spaces counts as missing", () => {
  assert.throws(
    () => parseGameRecord(makeRecord({ opponent2: "\u200B \u200B" }), 4),
    /Row 4: missing required fields \(opponent2:/
  );
});

test("teams must have distinct players and no shared player", () => {
  assert.throws(() => parseGameRecord(makeRecord({ partner2: "Ana" }), 2), /two distinct players/);
  assert.throws(() => parseGameRecord(makeRecord({ opponent1: "Ben" }), 2), /two distinct players/);
});

test("names are cleaned of zero-width and repeated whitespace", () => {
  assert.equal(cleanName("  Ana  Lee\u200B "), "Ana Lee");

  const parsed = parseGameRecord(makeRecord({ partner1: "Ana \u200BLee" }), 2);
  assert.equal(parsed.status === "accepted" ? parsed.game.teamA.player1 : null, "Ana Lee");
});

test("game store keeps accepted games in input order and lists skips by CSV line", () => {
  const store = buildGameStore([
    makeRecord({ game_id: "1" }),
    makeRecord({ game_id: "2", opponent1: "DEFAULT" }),
    makeRecord({ game_id: "3", team1_points: "5" })
  ]);

  assert.deepEqual(
    store.games.map((game) => game.gameId),
    ["1", "3"]
  );
  assert.deepEqual(store.skipped, [{ rowNumber: 3, matchId: "m1", gameId: "2", reason: "forfeit" }]);
});

test("game store aborts on the first invalid record", () => {
  assert.throws(
    () => buildGameStore([makeRecord(), makeRecord({ match_date: "2024-13-01" })]),
    /Row 3: invalid match_date/
  );
});

test("chronological order is by date then numeric game id", () => {
  const games = [
    makeGame(["A", "B"], ["C", "D"], 11, 3, { matchDate: "2024-09-12", gameId: "1" }),
    makeGame(["A", "B"], ["C", "D"], 11, 3, { matchDate: "2024-09-10", gameId: "10" }),
    makeGame(["A", "B"], ["C", "D"], 11, 3, { matchDate: "2024-09-10", gameId: "2" })
  ];

  const sorted = sortChronologically(games);

  assert.deepEqual(
    sorted.map((game) => `${game.matchDate}#${game.gameId}`),
    ["2024-09-10#2", "2024-09-10#10", "2024-09-12#1"]
  );
  assert.equal(games[0].gameId, "1");
});

test("forfeit detection covers both teams", () => {
  assert.equal(isForfeit(makeGame(["A", "B"], ["C", "D"], 11, 3)), false);
  assert.equal(isForfeit(makeGame(["A", "B"], ["DEFAULT", "D"], 11, 3)), true);
});

test("each player keeps the team name of the first game they appear in", () => {
  const teams = firstTeamByPlayer([
    makeGame(["A", "DEFAULT"], ["C", "D"], 0, 11, { teamNames: ["Ghosts", "Forfeit"] }),
    makeGame(["A", "B"], ["C", "D"], 11, 4, { teamNames: ["Aces", "Cats"] }),
    makeGame(["A", "C"], ["B", "E"], 11, 8, { gameId: "2", teamNames: ["Mixed", "Others"] })
  ]);

  assert.deepEqual(
    teams,
    new Map([
      ["A", "Aces"],
      ["B", "Aces"],
      ["C", "Cats"],
      ["D", "Cats"],
      ["E", "Others"]
    ])
  );
});
