import { Migrator, type Kysely } from "kysely";
import { migrations } from "./migrations";
import type { Database } from "./types";

export function createMigrator(db: Kysely<Database>) {
  return new Migrator({
    db,
    provider: { getMigrations: async () => migrations },
  });
}

export async function migrateToLatest(db: Kysely<Database>) {
  const { error, results } = await createMigrator(db).migrateToLatest();
  if (error) throw error;
  return results ?? [];
}
