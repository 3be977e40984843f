import { CHALLENGE_TEXT, REMOVED_TEXT, SEL } from "./selectors";
import type { Anomaly, BrowserDriver, Screen } from "./types";

export interface AnomalyDetectorOptions {
  maxScrolls: number;
  scrollPx: number;
  pause: () => Promise<void>;
}

/** Runs after every transition; nothing is extracted from a screen it flags. */
export class AnomalyDetector {
  constructor(
    private readonly driver: BrowserDriver,
    private readonly options: AnomalyDetectorOptions,
  ) {}

  async inspect(screen: Screen): Promise<Anomaly> {
    if (await this.driver.exists(SEL.challenge)) return "ChallengeScreen";
    const text = await this.driver.pageText();
    if (CHALLENGE_TEXT.some((re) => re.test(text))) return "ChallengeScreen";

    if (screen !== "PublisherPage") return "Normal";

    if (await this.driver.exists(SEL.publisher.removed)) return "AccountRemoved";
    if (REMOVED_TEXT.some((re) => re.test(text))) return "AccountRemoved";

    for (let attempt = 0; ; attempt++) {
      if (await this.driver.exists(SEL.publisher.item)) return "Normal";
      if (attempt >= this.options.maxScrolls) return "EmptyContent";
      await this.driver.scroll(this.options.scrollPx);
      await this.options.pause();
    }
  }
}
