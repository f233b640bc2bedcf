import postgres from "postgres";

export function createSql(connectionString: string) {
  if (!connectionString) {
    throw new Error("A Postgres connection string is required");
  }

  // PgBouncer in transaction mode does not support named prepared statements;
  // prepare: false uses the simple query protocol instead.
  return postgres(connectionString, {
    prepare: false,
    max: 3
  });
}

export type Sql = ReturnType<typeof createSql>;
