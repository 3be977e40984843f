import { errorMessage, type Logger } from "../lib/log";
import { CrawlAbort, IllegalTransition } from "./errors";
import { CHALLENGE_TEXT, INTERRUPT_MARKERS, REMOVED_TEXT, SCREEN_MARKER, SEL } from "./selectors";
import type { BrowserDriver, NavState, Screen } from "./types";

type Action = (driver: BrowserDriver, publisherUrl: string) => Promise<void>;

const close: Action = (driver) => driver.click(SEL.video.close);

/**
 * The only moves the crawler ever makes. Anything outside this table is a
 * bug in the caller, not a page condition.
 */
const TRANSITIONS: { [F in NavState]: Partial<Record<Screen, Action>> } = {
  AnyPage: {
    PublisherPage: (driver, publisherUrl) => driver.navigate(publisherUrl),
  },
  PublisherPage: {
    VideoPage: (driver) => driver.click(SEL.publisher.latestThumbnail),
  },
  VideoPage: {
    VideoPageWithCreatorFeed: (driver) => driver.click(SEL.video.creatorVideos),
    PublisherPage: close,
  },
  VideoPageWithCreatorFeed: {
    PublisherPage: close,
  },
};

export function isLegalTransition(from: NavState, to: NavState) {
  return to !== "AnyPage" && TRANSITIONS[from][to] !== undefined;
}

export interface NavigatorOptions {
  baseUrl: string;
  stepTimeoutMs: number;
  pause: () => Promise<void>;
  log?: Logger;
}

export class Navigator {
  private current: NavState = "AnyPage";

  constructor(
    private readonly driver: BrowserDriver,
    private readonly options: NavigatorOptions,
  ) {}

  get state(): NavState {
    return this.current;
  }

  publisherUrl(username: string) {
    const base = this.options.baseUrl.replace(/\/+$/, "");
    return `${base}/@${encodeURIComponent(username)}`;
  }

  /** Direct entry; valid from whatever screen the browser is on. */
  async enter(username: string) {
    this.current = "AnyPage";
    await this.go("PublisherPage", username);
  }

  async go(to: Screen, username: string) {
    const from = this.current;
    const action = TRANSITIONS[from][to];
    if (!action) throw new IllegalTransition(from, to);

    this.current = "AnyPage";
    await this.options.pause();

    const marker = SCREEN_MARKER[to];
    let arrived: boolean;
    try {
      await action(this.driver, this.publisherUrl(username));
      arrived = await this.driver.waitFor([marker, ...INTERRUPT_MARKERS].join(", "), this.options.stepTimeoutMs);
    } catch (err) {
      throw new CrawlAbort("NavigationStuck", `${from} -> ${to}: ${errorMessage(err)}`);
    }
    if (!arrived && !(await this.interruptedByText(to))) {
      throw new CrawlAbort("NavigationStuck", `${from} -> ${to}: ${marker} not seen within ${this.options.stepTimeoutMs}ms`);
    }

    this.current = to;
    this.options.log?.debug("navigated", { from, to, username });
  }

  // Some interstitials carry no element we can wait on, only wording.
  private async interruptedByText(to: Screen) {
    let text: string;
    try {
      text = await this.driver.pageText();
    } catch (err) {
      this.options.log?.debug("page text unavailable", { to, error: errorMessage(err) });
      return false;
    }
    const patterns = to === "PublisherPage" ? [...CHALLENGE_TEXT, ...REMOVED_TEXT] : CHALLENGE_TEXT;
    return patterns.some((re) => re.test(text));
  }

  /**
   * Brings the browser back to the publisher page: the close control when
   * the current screen has one, direct entry otherwise. Never throws.
   */
  async settle(username: string) {
    if (this.current === "PublisherPage") return true;

    if (this.current === "VideoPage" || this.current === "VideoPageWithCreatorFeed") {
      try {
        await this.go("PublisherPage", username);
        return true;
      } catch (err) {
        this.options.log?.warn("close control failed, re-entering", { username, error: errorMessage(err) });
      }
    }

    try {
      await this.enter(username);
      return true;
    } catch (err) {
      this.options.log?.warn("could not return to publisher page", { username, error: errorMessage(err) });
      return false;
    }
  }
}
