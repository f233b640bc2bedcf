import { ZodError } from "zod";
import { logRatingEvent } from "./ratingDebug";
import { cleanName, describeZodError, gameRecordSchema } from "./schemas";
import { FORFEIT_SENTINEL } from "./types";
import type { Game, SkippedRecord, Team } from "./types";

export type ParsedGameRecord =
  | { status: "accepted"; game: Game }
  | { status: "skipped"; skipped: SkippedRecord };

export interface GameStore {
  games: Game[];
  skipped: SkippedRecord[];
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const INTEGER = /^-?\d+$/;

export function parseGameRecord(record: unknown, rowNumber: number): ParsedGameRecord {
  const row = validateRecord(record, rowNumber);
  const players = [row.partner1, row.partner2, row.opponent1, row.opponent2];
  const [p1, p2, o1, o2] = players;

  if (players.includes(FORFEIT_SENTINEL)) {
    return {
      status: "skipped",
      skipped: { rowNumber, matchId: row.match_id, gameId: row.game_id, reason: "forfeit" }
    };
  }

  const matchDate = parseMatchDate(row.match_date);
  if (!matchDate) {
    throw new Error(`Row ${rowNumber}: invalid match_date "${row.match_date}", expected YYYY-MM-DD`);
  }

  if (new Set(players).size !== 4) {
    throw new Error(`Row ${rowNumber}: each team needs two distinct players and no player may be on both teams`);
  }

  const team1Raw = row.team1_points.trim();
  const team2Raw = row.team2_points.trim();
  if (!INTEGER.test(team1Raw) || !INTEGER.test(team2Raw)) {
    return {
      status: "skipped",
      skipped: { rowNumber, matchId: row.match_id, gameId: row.game_id, reason: "unparseable_score" }
    };
  }

  const team1Points = Number.parseInt(team1Raw, 10);
  const team2Points = Number.parseInt(team2Raw, 10);

  if (team1Points < 0 || team2Points < 0) {
    throw new Error(`Row ${rowNumber}: scores must be non-negative`);
  }

  if (team1Points === team2Points) {
    throw new Error(`Row ${rowNumber}: tied score ${team1Points}-${team2Points} is not a valid game result`);
  }

  return {
    status: "accepted",
    game: {
      matchId: row.match_id,
      gameId: row.game_id,
      matchDate,
      teamA: { name: cleanName(row.team1_name), player1: p1, player2: p2, points: team1Points },
      teamB: { name: cleanName(row.team2_name), player1: o1, player2: o2, points: team2Points }
    }
  };
}

export function buildGameStore(records: unknown[]): GameStore {
  const games: Game[] = [];
  const skipped: SkippedRecord[] = [];

  records.forEach((record, index) => {
    // Header occupies line 1 of a CSV file.
    const parsed = parseGameRecord(record, index + 2);

    if (parsed.status === "accepted") {
      games.push(parsed.game);
      return;
    }

    skipped.push(parsed.skipped);
    logRatingEvent("record_skipped", { ...parsed.skipped });
  });

  return { games, skipped };
}

export function sortChronologically(games: readonly Game[]) {
  return [...games].sort((a, b) => {
    if (a.matchDate !== b.matchDate) {
      return a.matchDate < b.matchDate ? -1 : 1;
    }

    return a.gameId.localeCompare(b.gameId, undefined, { numeric: true });
  });
}

/**
 * Team name for each player, taken from the first game (in input order) they
 * appear in.
 */
export function firstTeamByPlayer(games: readonly Game[]) {
  const teams = new Map<string, string>();

  for (const game of games) {
    if (isForfeit(game)) {
      continue;
    }

    for (const team of [game.teamA, game.teamB]) {
      for (const playerId of teamPlayers(team)) {
        if (!teams.has(playerId)) {
          teams.set(playerId, team.name);
        }
      }
    }
  }

  return teams;
}

export function teamPlayers(team: Team): [string, string] {
  return [team.player1, team.player2];
}

export function gamePlayers(game: Game) {
  return [...teamPlayers(game.teamA), ...teamPlayers(game.teamB)];
}

export function isForfeit(game: Game) {
  return gamePlayers(game).includes(FORFEIT_SENTINEL);
}

export function hasValidPoints(game: Game) {
  return (
    Number.isInteger(game.teamA.points) &&
    Number.isInteger(game.teamB.points) &&
    game.teamA.points !== game.teamB.points
  );
}

export function gameWinner(game: Game) {
  return game.teamA.points > game.teamB.points ? game.teamA : game.teamB;
}

export function gameLoser(game: Game) {
  return game.teamA.points > game.teamB.points ? game.teamB : game.teamA;
}

function validateRecord(record: unknown, rowNumber: number) {
  try {
    return gameRecordSchema.parse(record);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`Row ${rowNumber}: missing required fields (${describeZodError(error)})`);
    }

    throw error;
  }
}

function parseMatchDate(value: string) {
  const trimmed = value.trim();
  const parts = ISO_DATE.exec(trimmed);
  if (!parts) {
    return null;
  }

  const [year, month, day] = [Number(parts[1]), Number(parts[2]), Number(parts[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return trimmed;
}
