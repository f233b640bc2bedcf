import type { Game, GameRecord } from "../lib/types";

export function makeGame(
  teamA: [string, string],
  teamB: [string, string],
  scoreA: number,
  scoreB: number,
  { matchDate = "2024-09-10", matchId = "m1", gameId = "1", teamNames = ["", ""] }: {
    matchDate?: string;
    matchId?: string;
    gameId?: string;
    teamNames?: [string, string];
  } = {}
): Game {
  return {
    matchId,
    gameId,
    matchDate,
    teamA: { name: teamNames[0], player1: teamA[0], player2: teamA[1], points: scoreA },
    teamB: { name: teamNames[1], player1: teamB[0], player2: teamB[1], points: scoreB }
  };
}

export function makeRecord(overrides: Partial<GameRecord> = {}): GameRecord {
  return {
    match_id: "m1",
    game_id: "1",
    match_date: "2024-09-10",
    team1_name: "Dinks",
    team2_name: "Lobs",
    partner1: "Ana",
    partner2: "Ben",
    opponent1: "Cal",
    opponent2: "Dee",
    team1_points: "11",
    team2_points: "7",
    ...overrides
  };
}

export function assertClose(actual: number, expected: number, tolerance = 1e-12) {
  if (Math.abs(actual - expected) > tolerance) {
    throw new Error(`Expected ${actual} to be within ${tolerance} of ${expected}`);
  }
}
