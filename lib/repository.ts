import { createSql } from "./db";
import type { Sql } from "./db";
import { buildGameStore } from "./games";
import type { GameRecord } from "./types";

// Every column is read as text so rows go through the same validation as CSV records.
export async function listGameRecords(sql: Sql) {
  const rows = await sql<GameRecord[]>`
    select
      match_id::text as match_id,
      game_id::text as game_id,
      to_char(match_date, 'YYYY-MM-DD') as match_date,
      coalesce(team1_name, '') as team1_name,
      coalesce(team2_name, '') as team2_name,
      partner1,
      partner2,
      opponent1,
      opponent2,
      coalesce(team1_points::text, '') as team1_points,
      coalesce(team2_points::text, '') as team2_points
    from match_games
    order by match_date asc, match_id asc, game_id asc
  `;

  return [...rows];
}

export async function loadGamesFromDatabase(connectionString: string) {
  const sql = createSql(connectionString);

  try {
    return buildGameStore(await listGameRecords(sql));
  } finally {
    await sql.end();
  }
}
