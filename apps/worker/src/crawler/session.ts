import { errorMessage, type Logger } from "../lib/log";
import type { AnomalyDetector } from "./anomaly";
import { CrawlAbort, IllegalTransition } from "./errors";
import { collectBackHalves, collectFrontHalves, extractHeavy, withFeedPlayCount } from "./extract";
import { mergeLightFragments } from "./merge";
import type { Navigator } from "./navigation";
import type {
  AbortReason,
  BrowserDriver,
  CrawlMode,
  CrawlerIdentity,
  HeavyRecord,
  LightRecord,
  Screen,
  TargetAccount,
} from "./types";

export type SessionPhase = "Start" | "ListingCollected" | "HeavyCollectionLoop" | "LightMerged" | "Done";

interface SessionResult {
  phases: SessionPhase[];
  heavy: HeavyRecord | null;
  light: LightRecord[];
  /** Whether the browser was left on the publisher page. */
  settled: boolean;
}

export type SessionOutcome =
  | (SessionResult & { status: "done" })
  | (SessionResult & { status: "aborted"; reason: AbortReason; detail: string });

export interface SessionContext {
  driver: BrowserDriver;
  navigator: Navigator;
  detector: AnomalyDetector;
  identity: CrawlerIdentity;
  target: TargetAccount;
  mode: CrawlMode;
  maxVideos: number;
  baseUrl: string;
  maxScrolls: number;
  scrollPx: number;
  pause: () => Promise<void>;
  now?: () => Date;
  log?: Logger;
}

/** Driver failures inside a step are a stuck step, never a crash of the batch. */
async function step<T>(label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof CrawlAbort) throw err;
    if (err instanceof IllegalTransition) throw err;
    throw new CrawlAbort("NavigationStuck", `${label}: ${errorMessage(err)}`);
  }
}

export async function runSession(ctx: SessionContext): Promise<SessionOutcome> {
  const { driver, navigator, detector, target, mode } = ctx;
  const crawledAt = (ctx.now ?? (() => new Date()))();
  const scroll = { maxScrolls: ctx.maxScrolls, scrollPx: ctx.scrollPx, pause: ctx.pause };
  const phases: SessionPhase[] = ["Start"];
  let heavy: HeavyRecord | null = null;
  let light: LightRecord[] = [];
  let abort: CrawlAbort | null = null;
  let settled = false;

  const gate = async (screen: Screen) => {
    const anomaly = await step(`inspect ${screen}`, () => detector.inspect(screen));
    if (anomaly !== "Normal") throw new CrawlAbort(anomaly, `${anomaly} on ${screen}`);
  };

  try {
    await step("enter publisher", () => navigator.enter(target.username));
    await gate("PublisherPage");

    const fronts = await step("collect listing", () =>
      collectFrontHalves(driver, { ...scroll, max: ctx.maxVideos, baseUrl: ctx.baseUrl }),
    );
    if (fronts.length === 0) throw new CrawlAbort("NoUsableData", "listing produced no video links");
    phases.push("ListingCollected");

    await step("open latest video", () => navigator.go("VideoPage", target.username));
    await gate("VideoPage");
    phases.push("HeavyCollectionLoop");

    if (mode !== "light") {
      heavy = await step("extract video page", () =>
        extractHeavy(driver, fronts[0], {
          targetId: target.id,
          username: target.username,
          crawledAt,
          baseUrl: ctx.baseUrl,
        }),
      );
      if (!heavy && mode === "heavy") throw new CrawlAbort("NoUsableData", "video page had no readable fields");
    }

    if (mode !== "heavy") {
      await step("open creator feed", () => navigator.go("VideoPageWithCreatorFeed", target.username));
      await gate("VideoPageWithCreatorFeed");

      const wanted = new Set(fronts.flatMap((f) => (f.thumbnailUrl ? [f.thumbnailUrl] : [])));
      const backs = await step("collect creator feed", () => collectBackHalves(driver, { ...scroll, wanted }));
      light = mergeLightFragments(fronts, backs, { targetId: target.id, username: target.username, crawledAt });
      if (heavy) heavy = withFeedPlayCount(heavy, backs);
      phases.push("LightMerged");
    }

    await step("close video", () => navigator.go("PublisherPage", target.username));
    phases.push("Done");
  } catch (err) {
    if (!(err instanceof CrawlAbort)) throw err;
    abort = err;
  } finally {
    settled = await navigator.settle(target.username);
  }

  const result: SessionResult = { phases, heavy, light, settled };
  if (abort) {
    ctx.log?.warn("session aborted", {
      target: target.username,
      identity: ctx.identity.id,
      reason: abort.reason,
      detail: abort.message,
    });
    return { ...result, status: "aborted", reason: abort.reason, detail: abort.message };
  }
  ctx.log?.info("session done", {
    target: target.username,
    heavy: heavy ? 1 : 0,
    light: light.length,
  });
  return { ...result, status: "done" };
}
