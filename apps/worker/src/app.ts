import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type { Kysely } from "kysely";
import { z } from "zod";
import type { CrawlRunStatus, Database } from "./db/types";
import { env } from "./env";
import { CrawlRunConfigSchema, createCrawlRun, isTerminal } from "./jobs/crawl";
import { nowIso } from "./lib/ids";
import { createLogger, errorMessage } from "./lib/log";

export interface AppDeps {
  /** Kicks off a queued run in the background. */
  startRun: (runId: string) => void;
}

type Handler = (req: Request, res: Response) => Promise<unknown>;

const log = createLogger("http");

const handle = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

export function createApp(db: Kysely<Database>, deps: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  const findRun = (id: string) => db.selectFrom("crawl_runs").selectAll().where("id", "=", id).executeTakeFirst();

  const countIdentities = async () => {
    const row = await db
      .selectFrom("crawler_identities")
      .select((eb) => eb.fn.countAll().as("count"))
      .where("is_alive", "=", 1)
      .executeTakeFirstOrThrow();
    return Number(row.count);
  };

  const countTargets = async () => {
    const row = await db
      .selectFrom("target_accounts")
      .select((eb) => eb.fn.countAll().as("count"))
      .where("is_alive", "=", 1)
      .executeTakeFirstOrThrow();
    return Number(row.count);
  };

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get(
    "/api/env-status",
    handle(async (_req, res) => {
      res.json({
        dialect: env.DB_DIALECT,
        baseUrl: env.CRAWL_BASE_URL,
        login: env.CRAWL_LOGIN,
        headless: env.HEADLESS,
        hasChromiumPath: Boolean(env.PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH),
        identitiesAlive: await countIdentities(),
        targetsAlive: await countTargets(),
      });
    }),
  );

  app.post(
    "/api/crawl-runs",
    handle(async (req, res) => {
      const parsed = CrawlRunConfigSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: "invalid crawl config", issues: parsed.error.issues });
      }
      const { id, config } = await createCrawlRun(db, parsed.data);
      deps.startRun(id);
      res.json({ id, config });
    }),
  );

  app.get(
    "/api/crawl-runs/:id",
    handle(async (req, res) => {
      const run = await findRun(z.string().parse(req.params.id));
      if (!run) return res.status(404).json({ error: "not found" });
      res.json(run);
    }),
  );

  app.get(
    "/api/crawl-runs-latest",
    handle(async (_req, res) => {
      const run = await db
        .selectFrom("crawl_runs")
        .selectAll()
        .orderBy("created_at", "desc")
        .limit(1)
        .executeTakeFirst();
      if (!run) return res.status(404).json({ error: "not found" });
      res.json(run);
    }),
  );

  const transition = (to: CrawlRunStatus, from: CrawlRunStatus[]) =>
    handle(async (req, res) => {
      const id = z.string().parse(req.params.id);
      const run = await findRun(id);
      if (!run) return res.status(404).json({ error: "not found" });
      if (!from.includes(run.status)) {
        return res.status(409).json({ error: `cannot move a ${run.status} run to ${to}` });
      }
      await db
        .updateTable("crawl_runs")
        .set(isTerminal(to) ? { status: to, finished_at: nowIso() } : { status: to })
        .where("id", "=", id)
        .execute();
      res.json({ ok: true, status: to });
    });

  app.post("/api/crawl-runs/:id/pause", transition("paused", ["queued", "running"]));
  app.post("/api/crawl-runs/:id/resume", transition("running", ["paused"]));
  app.post("/api/crawl-runs/:id/cancel", transition("cancelled", ["queued", "running", "paused"]));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    log.error("request failed", { error: errorMessage(err) });
    res.status(500).json({ error: errorMessage(err) });
  });

  return app;
}
