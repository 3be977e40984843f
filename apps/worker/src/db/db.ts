import { Kysely, PostgresDialect, SqliteDialect } from "kysely";
import DatabaseSqlite from "better-sqlite3";
import { Pool } from "pg";
import { env } from "../env";
import type { Database } from "./types";

export interface DbConfig {
  dialect: "sqlite" | "postgres";
  sqlitePath: string;
  databaseUrl?: string;
}

export function createDb(
  config: DbConfig = { dialect: env.DB_DIALECT, sqlitePath: env.SQLITE_PATH, databaseUrl: env.DATABASE_URL },
) {
  if (config.dialect === "postgres") {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is required when DB_DIALECT=postgres");
    }
    const pool = new Pool({ connectionString: config.databaseUrl });
    const dialect = new PostgresDialect({ pool });
    return new Kysely<Database>({ dialect });
  }

  const sqlite = new DatabaseSqlite(config.sqlitePath);
  const dialect = new SqliteDialect({ database: sqlite });
  return new Kysely<Database>({ dialect });
}
