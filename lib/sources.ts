import { loadGameCsv } from "./csv";
import type { GameStore } from "./games";
import { describeSource, isDatabaseUrl, logRatingEvent } from "./ratingDebug";
import { loadGamesFromDatabase } from "./repository";

/**
 * Loads games from a CSV path or a Postgres URL. The literal source "db"
 * reads the URL from DATABASE_URL.
 */
export async function loadGameStore(source: string): Promise<GameStore> {
  const resolved = source === "db" ? process.env.DATABASE_URL ?? "" : source;

  if (source === "db" && !resolved) {
    throw new Error("DATABASE_URL is required when the source is db");
  }

  const store = isDatabaseUrl(resolved) ? await loadGamesFromDatabase(resolved) : await loadGameCsv(resolved);

  logRatingEvent("source_loaded", {
    source: describeSource(resolved),
    games: store.games.length,
    skipped: store.skipped.length
  });

  return store;
}
