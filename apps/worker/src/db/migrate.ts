import { createDb } from "./db";
import { createMigrator } from "./migrator";

async function main() {
  const db = createDb();
  const { error, results } = await createMigrator(db).migrateToLatest();
  if (results) {
    for (const result of results) {
      if (result.status === "Success") {
        process.stdout.write(`migrated ${result.migrationName}\n`);
      } else {
        process.stdout.write(`failed ${result.migrationName}\n`);
      }
    }
  }
  if (error) {
    throw error;
  }
  await db.destroy();
}

main().catch((err) => {
  process.stderr.write(String(err) + "\n");
  process.exit(1);
});
