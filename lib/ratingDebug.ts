import type { Game } from "./types";

export function isRatingDebugEnabled() {
  return process.env.RATING_DEBUG === "1";
}

export function logRatingEvent(event: string, payload: Record<string, unknown>) {
  if (!isRatingDebugEnabled()) {
    return;
  }

  const envelope = {
    ts: new Date().toISOString(),
    pid: process.pid,
    event,
    ...payload
  };

  // stdout carries command output.
  console.error(`[ratings-debug] ${JSON.stringify(envelope)}`);
}

export function gameKey(game: Game) {
  return `${game.matchId}#${game.gameId}`;
}

export function summarizeGame(game: Game) {
  return {
    key: gameKey(game),
    date: game.matchDate,
    teamA: [game.teamA.player1, game.teamA.player2],
    teamB: [game.teamB.player1, game.teamB.player2],
    score: `${game.teamA.points}-${game.teamB.points}`
  };
}

// Strips credentials from database URLs so they never reach the log.
export function describeSource(source: string) {
  if (!isDatabaseUrl(source)) {
    return source;
  }

  try {
    const parsed = new URL(source);
    const dbName = parsed.pathname.replace(/^\/+/, "") || "unknown";
    return `${parsed.hostname}:${parsed.port || "5432"}/${dbName}`;
  } catch {
    return "invalid-url";
  }
}

export function isDatabaseUrl(source: string) {
  return source.startsWith("postgres://") || source.startsWith("postgresql://");
}
