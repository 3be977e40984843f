import { createApp } from "./app";
import { createDb } from "./db/db";
import { env } from "./env";
import { runCrawlJob } from "./jobs/crawl";
import { createLogger, errorMessage } from "./lib/log";

const db = createDb();
const log = createLogger("worker");

const startRun = (runId: string, delayMs = 50) => {
  setTimeout(() => {
    runCrawlJob(db, runId).catch((err) => log.error("crawl run crashed", { run: runId, error: errorMessage(err) }));
  }, delayMs);
};

const app = createApp(db, { startRun: (runId) => startRun(runId) });

const port = env.PORT;
app.listen(port, () => {
  log.info(`worker listening on ${port}`);

  const resume = async () => {
    const run = await db
      .selectFrom("crawl_runs")
      .select(["id", "status"])
      .where("finished_at", "is", null)
      .where("status", "in", ["queued", "running", "paused"])
      .orderBy("created_at", "desc")
      .limit(1)
      .executeTakeFirst();
    if (!run) return;
    if (run.status === "running") {
      await db.updateTable("crawl_runs").set({ status: "queued" }).where("id", "=", run.id).execute();
    }
    log.info("resuming unfinished run", { run: run.id, status: run.status });
    startRun(run.id, 200);
  };

  resume().catch((err) => log.error("resume failed", { error: errorMessage(err) }));
});
