import { randomId } from "../lib/ids";
import { createLogger, errorMessage, type Logger } from "../lib/log";
import { AnomalyDetector } from "./anomaly";
import { signIn } from "./login";
import { Navigator } from "./navigation";
import { runSession, type SessionOutcome } from "./session";
import type { BrowserDriver, CrawlMode, CrawlRepository, CrawlerIdentity, Lease, TargetAccount } from "./types";

export interface EngineConfig {
  baseUrl: string;
  stepTimeoutMs: number;
  maxScrolls: number;
  scrollPx: number;
  login: boolean;
  /** How long an identity lease or a target claim lasts without renewal. */
  leaseMs: number;
  /** Human-like wait before each browser action and between targets. */
  pause: () => Promise<void>;
}

export interface RunOptions {
  mode: CrawlMode;
  identityId?: string;
  maxVideosPerTarget: number;
  /** Batch size per identity. */
  maxTargets: number;
  recrawl: boolean;
  /** Targets the whole run may dispatch, across identities. */
  budget: number;
  /** Identities driven in parallel. */
  identities: number;
}

export type DriverFactory = (identity: CrawlerIdentity) => Promise<BrowserDriver>;

export interface SessionReport {
  identity: CrawlerIdentity;
  target: TargetAccount;
  outcome: SessionOutcome;
}

export interface RunHooks {
  /** Checked before each dispatch; false stops the run without touching in-flight work. */
  shouldContinue?: () => Promise<boolean>;
  onSession?: (report: SessionReport) => Promise<void>;
}

export interface RunSummary {
  status: "completed" | "aborted";
  reason: string | null;
  identitiesUsed: number;
  identityFailures: number;
  targetsAttempted: number;
  targetsCompleted: number;
  targetsFailed: number;
  heavySaved: number;
  lightSaved: number;
  budgetExhausted: boolean;
}

export class CrawlBudget {
  constructor(private remaining: number) {}

  take() {
    if (this.remaining <= 0) return false;
    this.remaining -= 1;
    return true;
  }

  get left() {
    return this.remaining;
  }
}

export interface SchedulerDeps {
  repository: CrawlRepository;
  driverFactory: DriverFactory;
  config: EngineConfig;
  hooks?: RunHooks;
  now?: () => Date;
  log?: Logger;
  /** Lease holder name, usually the crawl run id. */
  holder?: string;
}

export class Scheduler {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly holder: string;

  constructor(private readonly deps: SchedulerDeps) {
    this.log = deps.log ?? createLogger("scheduler");
    this.now = deps.now ?? (() => new Date());
    this.holder = deps.holder ?? randomId("run");
  }

  private lease(): Lease {
    const now = this.now();
    return { holder: this.holder, now, until: new Date(now.getTime() + this.deps.config.leaseMs) };
  }

  async run(options: RunOptions): Promise<RunSummary> {
    const summary: RunSummary = {
      status: "completed",
      reason: null,
      identitiesUsed: 0,
      identityFailures: 0,
      targetsAttempted: 0,
      targetsCompleted: 0,
      targetsFailed: 0,
      heavySaved: 0,
      lightSaved: 0,
      budgetExhausted: false,
    };

    const identities = await this.pickIdentities(options);
    if (identities.length === 0) {
      summary.status = "aborted";
      summary.reason = options.identityId
        ? `crawler identity ${options.identityId} is not available`
        : "no available crawler identity";
      this.log.error(summary.reason);
      return summary;
    }
    summary.identitiesUsed = identities.length;

    const budget = new CrawlBudget(options.budget);
    await Promise.all(identities.map((identity) => this.runIdentity(identity, options, budget, summary)));

    if (summary.targetsAttempted === 0 && summary.identityFailures >= identities.length) {
      summary.status = "aborted";
      summary.reason ??= "every crawler identity failed before its first target";
    }
    this.log.info("run finished", { ...summary });
    return summary;
  }

  private async pickIdentities(options: RunOptions) {
    const picked: CrawlerIdentity[] = [];
    const wanted = options.identityId ? 1 : Math.max(1, options.identities);
    while (picked.length < wanted) {
      const next = await this.deps.repository.nextIdentity(options.identityId, {
        exclude: picked.map((i) => i.id),
        lease: this.lease(),
      });
      if (!next) break;
      picked.push(next);
    }
    return picked;
  }

  private async runIdentity(identity: CrawlerIdentity, options: RunOptions, budget: CrawlBudget, summary: RunSummary) {
    const { repository } = this.deps;
    try {
      await this.runBatch(identity, options, budget, summary);
    } catch (err) {
      summary.identityFailures += 1;
      summary.reason = `identity ${identity.id}: ${errorMessage(err)}`;
      this.log.error("identity failed", { identity: identity.id, error: errorMessage(err) });
    } finally {
      try {
        await repository.releaseIdentity(identity.id, this.holder);
      } catch (err) {
        this.log.warn("identity lease not released, it expires on its own", {
          identity: identity.id,
          error: errorMessage(err),
        });
      }
    }
  }

  private async runBatch(identity: CrawlerIdentity, options: RunOptions, budget: CrawlBudget, summary: RunSummary) {
    const { repository, config, hooks } = this.deps;
    const log = this.log;

    let driver: BrowserDriver;
    try {
      driver = await this.deps.driverFactory(identity);
    } catch (err) {
      summary.identityFailures += 1;
      summary.reason = `browser launch failed: ${errorMessage(err)}`;
      log.error("browser launch failed", { identity: identity.id, error: errorMessage(err) });
      return;
    }

    try {
      if (config.login) {
        const signedIn = await signIn(driver, identity, { ...config, log });
        if (signedIn !== "SignedIn") {
          summary.identityFailures += 1;
          summary.reason = `sign-in for ${identity.id}: ${signedIn}`;
          if (signedIn === "Rejected") await repository.markIdentityDead(identity.id);
          log.warn("sign-in failed", { identity: identity.id, result: signedIn });
          return;
        }
      }

      const targets = await repository.nextTargets(identity.id, options.maxTargets, options.recrawl);
      log.info("batch selected", { identity: identity.id, targets: targets.map((t) => t.username) });

      const navigator = new Navigator(driver, { ...config, log });
      const detector = new AnomalyDetector(driver, config);

      for (const target of targets) {
        if (hooks?.shouldContinue && !(await hooks.shouldContinue())) {
          log.info("run stopped before next target", { identity: identity.id });
          break;
        }
        if (budget.left <= 0) {
          summary.budgetExhausted = true;
          break;
        }
        const lease = this.lease();
        if (!(await repository.renewIdentity(identity.id, lease))) {
          log.warn("identity lease taken over, ending batch", { identity: identity.id });
          break;
        }
        if (!(await repository.assignTarget(target.id, identity.id, lease))) {
          log.warn("target claimed by another session", { target: target.username });
          continue;
        }
        if (!budget.take()) {
          summary.budgetExhausted = true;
          await this.releaseTarget(target, identity, false);
          break;
        }

        summary.targetsAttempted += 1;
        let outcome: SessionOutcome;
        try {
          outcome = await runSession({
            driver,
            navigator,
            detector,
            identity,
            target,
            mode: options.mode,
            maxVideos: options.maxVideosPerTarget,
            baseUrl: config.baseUrl,
            maxScrolls: config.maxScrolls,
            scrollPx: config.scrollPx,
            pause: config.pause,
            now: this.now,
            log,
          });
          await this.apply(target, outcome, summary);
        } catch (err) {
          summary.targetsFailed += 1;
          log.error("target failed unexpectedly", { target: target.username, error: errorMessage(err) });
          await this.releaseTarget(target, identity, false);
          continue;
        }

        const challenged = outcome.status === "aborted" && outcome.reason === "ChallengeScreen";
        // A challenged target goes back to the pool so another identity can take it.
        await this.releaseTarget(target, identity, challenged);
        await hooks?.onSession?.({ identity, target, outcome });

        if (challenged) {
          log.warn("challenge screen, leaving the rest of the batch for a later run", { identity: identity.id });
          break;
        }
        await config.pause();
      }
    } finally {
      try {
        await driver.close();
      } catch (err) {
        log.warn("browser close failed", { identity: identity.id, error: errorMessage(err) });
      }
      await repository.touchIdentity(identity.id, this.now());
    }
  }

  private async releaseTarget(target: TargetAccount, identity: CrawlerIdentity, unassign: boolean) {
    try {
      await this.deps.repository.releaseTarget(target.id, identity.id, { unassign });
    } catch (err) {
      this.log.warn("target claim not released, it expires on its own", {
        target: target.username,
        error: errorMessage(err),
      });
    }
  }

  /** Persists what a session produced, then the liveness/timestamp changes its outcome calls for. */
  private async apply(target: TargetAccount, outcome: SessionOutcome, summary: RunSummary) {
    const { repository } = this.deps;

    if (outcome.heavy) {
      await repository.saveHeavy(outcome.heavy);
      summary.heavySaved += 1;
    }
    if (outcome.light.length > 0) {
      await repository.saveLight(outcome.light);
      summary.lightSaved += outcome.light.length;
    }

    if (outcome.status === "done") {
      await repository.touchTarget(target.id, this.now());
      summary.targetsCompleted += 1;
      return;
    }

    switch (outcome.reason) {
      case "AccountRemoved":
        await repository.markTargetDead(target.id);
        break;
      case "ChallengeScreen":
      case "NavigationStuck":
        break;
      case "EmptyContent":
      case "NoUsableData":
        await repository.touchTarget(target.id, this.now());
        break;
    }
    summary.targetsFailed += 1;
  }
}
