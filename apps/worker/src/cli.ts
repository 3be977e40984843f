import { createDb } from "./db/db";
import { createCrawlRun, runCrawlJob } from "./jobs/crawl";
import { parseCrawlArgs } from "./lib/args";

async function main() {
  const input = parseCrawlArgs(process.argv.slice(2));
  const db = createDb();
  try {
    const { id } = await createCrawlRun(db, input);
    const { status, summary } = await runCrawlJob(db, id);
    process.stdout.write(JSON.stringify({ id, status, summary }, null, 2) + "\n");
    if (status === "failed" || status === "aborted") process.exitCode = 1;
  } finally {
    await db.destroy();
  }
}

main().catch((err) => {
  process.stderr.write(String(err) + "\n");
  process.exit(1);
});
