import { sql, type Kysely } from "kysely";
import { z } from "zod";
import { PlaywrightDriver } from "../crawler/playwright";
import { Scheduler, type DriverFactory, type EngineConfig, type RunSummary } from "../crawler/scheduler";
import { KyselyCrawlRepository } from "../db/repository";
import type { CrawlRunRow, CrawlRunStatus, Database } from "../db/types";
import { env } from "../env";
import { humanPause, nowIso, randomId, sleep } from "../lib/ids";
import { createLogger, errorMessage, type Logger } from "../lib/log";

export const CrawlRunConfigSchema = z.object({
  mode: z.enum(["light", "heavy", "both"]).default("both"),
  identityId: z.string().min(1).optional(),
  maxVideosPerTarget: z.number().int().min(1).max(500).default(30),
  maxTargets: z.number().int().min(1).max(1000).default(10),
  recrawl: z.boolean().default(false),
  budget: z.number().int().min(1).default(env.CRAWL_TARGET_BUDGET),
  identities: z.number().int().min(1).max(16).default(1),
});

export type CrawlRunConfig = z.infer<typeof CrawlRunConfigSchema>;
export type CrawlRunInput = z.input<typeof CrawlRunConfigSchema>;

const TERMINAL: CrawlRunStatus[] = ["completed", "aborted", "failed", "cancelled"];

export function isTerminal(status: CrawlRunStatus) {
  return TERMINAL.includes(status);
}

export function engineConfigFromEnv(): EngineConfig {
  return {
    baseUrl: env.CRAWL_BASE_URL,
    stepTimeoutMs: env.CRAWL_STEP_TIMEOUT_MS,
    maxScrolls: env.CRAWL_MAX_SCROLLS,
    scrollPx: env.CRAWL_SCROLL_PX,
    login: env.CRAWL_LOGIN,
    leaseMs: env.CRAWL_LEASE_MS,
    pause: () => humanPause(env.CRAWL_DELAY_MIN_MS, env.CRAWL_DELAY_MAX_MS),
  };
}

export async function createCrawlRun(db: Kysely<Database>, input: CrawlRunInput) {
  const config = CrawlRunConfigSchema.parse(input);
  const id = randomId("crawl");
  await db
    .insertInto("crawl_runs")
    .values({
      id,
      status: "queued",
      created_at: nowIso(),
      started_at: null,
      finished_at: null,
      config_json: JSON.stringify(config),
      targets_attempted: 0,
      targets_completed: 0,
      targets_failed: 0,
      heavy_saved: 0,
      light_saved: 0,
      last_error: null,
    })
    .execute();
  return { id, config };
}

export interface CrawlJobDeps {
  driverFactory?: DriverFactory;
  engine?: EngineConfig;
  now?: () => Date;
  log?: Logger;
  /** How often a paused run re-reads its status. */
  pollMs?: number;
}

export interface CrawlJobResult {
  status: CrawlRunStatus;
  summary: RunSummary | null;
}

export async function runCrawlJob(db: Kysely<Database>, runId: string, deps: CrawlJobDeps = {}): Promise<CrawlJobResult> {
  const run = await db.selectFrom("crawl_runs").selectAll().where("id", "=", runId).executeTakeFirst();
  if (!run) throw new Error(`crawl run ${runId} not found`);
  if (isTerminal(run.status)) return { status: run.status, summary: null };

  const log = deps.log ?? createLogger("crawl-run");
  const pollMs = deps.pollMs ?? 1000;

  const updateStatus = async (status: CrawlRunStatus, patch?: Partial<CrawlRunRow>) => {
    await db
      .updateTable("crawl_runs")
      .set({ status, ...patch })
      .where("id", "=", runId)
      .execute();
  };

  const readStatus = async () => {
    const current = await db.selectFrom("crawl_runs").select(["status"]).where("id", "=", runId).executeTakeFirst();
    return current?.status ?? null;
  };

  // A paused run blocks here; anything but running afterwards stops new dispatch.
  const waitIfPausedOrCancelled = async () => {
    while (true) {
      const status = await readStatus();
      if (status === "paused") {
        await sleep(pollMs);
        continue;
      }
      return status === "running";
    }
  };

  let config: CrawlRunConfig;
  try {
    config = CrawlRunConfigSchema.parse(JSON.parse(run.config_json));
  } catch (err) {
    const message = `invalid run config: ${errorMessage(err)}`;
    await updateStatus("failed", { finished_at: nowIso(), last_error: message });
    return { status: "failed", summary: null };
  }

  if (run.status === "paused") {
    if (!run.started_at) await updateStatus("paused", { started_at: nowIso() });
  } else {
    await updateStatus("running", { started_at: run.started_at ?? nowIso(), last_error: null });
  }
  log.info("run started", { run: runId, ...config });

  const scheduler = new Scheduler({
    repository: new KyselyCrawlRepository(db),
    driverFactory: deps.driverFactory ?? ((identity) => PlaywrightDriver.forIdentity(identity)),
    config: deps.engine ?? engineConfigFromEnv(),
    now: deps.now,
    log,
    holder: runId,
    hooks: {
      shouldContinue: waitIfPausedOrCancelled,
      onSession: async ({ outcome }) => {
        const done = outcome.status === "done" ? 1 : 0;
        await db
          .updateTable("crawl_runs")
          .set({
            targets_attempted: sql`targets_attempted + 1`,
            targets_completed: sql`targets_completed + ${done}`,
            targets_failed: sql`targets_failed + ${1 - done}`,
            heavy_saved: sql`heavy_saved + ${outcome.heavy ? 1 : 0}`,
            light_saved: sql`light_saved + ${outcome.light.length}`,
            ...(outcome.status === "aborted" ? { last_error: `${outcome.reason}: ${outcome.detail}` } : {}),
          })
          .where("id", "=", runId)
          .execute();
      },
    },
  });

  try {
    const summary = await scheduler.run(config);
    const counters = {
      finished_at: nowIso(),
      targets_attempted: summary.targetsAttempted,
      targets_completed: summary.targetsCompleted,
      targets_failed: summary.targetsFailed,
      heavy_saved: summary.heavySaved,
      light_saved: summary.lightSaved,
    };

    if ((await readStatus()) === "cancelled") {
      await updateStatus("cancelled", counters);
      return { status: "cancelled", summary };
    }
    if (summary.status === "aborted") {
      await updateStatus("aborted", { ...counters, last_error: summary.reason });
      return { status: "aborted", summary };
    }
    await updateStatus("completed", counters);
    return { status: "completed", summary };
  } catch (err) {
    const message = errorMessage(err);
    log.error("run failed", { run: runId, error: message });
    await updateStatus("failed", { finished_at: nowIso(), last_error: message });
    return { status: "failed", summary: null };
  }
}
