import { chromium, errors, type Browser, type BrowserContext, type Page } from "playwright";
import { env } from "../env";
import { resolveChromiumExecutablePath } from "./executable";
import type { BrowserDriver, CrawlerIdentity, ExtractSpec, RawFragment } from "./types";

export interface LaunchOptions {
  proxy?: string | null;
  headless?: boolean;
  stepTimeoutMs?: number;
  keyDelayMs?: number;
}

export interface ProxySettings {
  server: string;
  username?: string;
  password?: string;
}

/**
 * Chromium ignores credentials inside the proxy URL, so `user:pass@host`
 * is split into the separate fields Playwright passes on.
 */
export function proxySettings(proxy: string): ProxySettings {
  const withScheme = proxy.includes("://") ? proxy : `http://${proxy}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return { server: proxy };
  }
  const settings: ProxySettings = { server: `${url.protocol}//${url.host}` };
  if (url.username) settings.username = decodeURIComponent(url.username);
  if (url.password) settings.password = decodeURIComponent(url.password);
  return settings;
}

/** One Chromium per crawler identity, with the identity's egress route. */
export class PlaywrightDriver implements BrowserDriver {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly keyDelayMs: number,
  ) {}

  static async launch(options: LaunchOptions = {}) {
    const executablePath = resolveChromiumExecutablePath(env.PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH);
    const browser = await chromium.launch({
      headless: options.headless ?? env.HEADLESS,
      executablePath,
      proxy: options.proxy ? proxySettings(options.proxy) : undefined,
      args: ["--disable-blink-features=AutomationControlled"],
    });
    try {
      // Listing thumbnails only resolve to real URLs at a desktop-sized viewport.
      const context = await browser.newContext({
        userAgent: env.PLAYWRIGHT_USER_AGENT,
        viewport: { width: 1920, height: 1080 },
        locale: env.PLAYWRIGHT_LOCALE,
      });
      await context.addInitScript(() => {
        Object.defineProperty(navigator, "webdriver", { get: () => undefined });
      });
      context.setDefaultTimeout(options.stepTimeoutMs ?? env.CRAWL_STEP_TIMEOUT_MS);
      const page = await context.newPage();
      return new PlaywrightDriver(browser, context, page, options.keyDelayMs ?? env.CRAWL_KEY_DELAY_MS);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  static forIdentity(identity: CrawlerIdentity) {
    return PlaywrightDriver.launch({ proxy: identity.proxy });
  }

  async navigate(url: string) {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async click(locator: string) {
    await this.page.locator(locator).first().click();
  }

  async fill(locator: string, value: string) {
    const input = this.page.locator(locator).first();
    await input.click();
    await input.pressSequentially(value, { delay: this.keyDelayMs });
  }

  async scroll(amount: number) {
    await this.page.mouse.wheel(0, amount);
  }

  async waitFor(locator: string, timeoutMs: number) {
    try {
      await this.page.locator(locator).first().waitFor({ state: "attached", timeout: timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }
  }

  async exists(locator: string) {
    return (await this.page.locator(locator).count()) > 0;
  }

  async extract(locator: string, fields: ExtractSpec): Promise<RawFragment[]> {
    return this.page.$$eval(
      locator,
      (elements, spec) =>
        elements.map((el) => {
          const out: Record<string, string | null> = {};
          for (const [name, f] of Object.entries(spec)) {
            const node = f.selector ? el.querySelector(f.selector) : el;
            if (!node) {
              out[name] = null;
              continue;
            }
            out[name] = f.attr ? node.getAttribute(f.attr) : (node.textContent ?? "").trim();
          }
          return out;
        }),
      fields,
    );
  }

  async pageText() {
    return this.page.locator("body").innerText();
  }

  async currentUrl() {
    return this.page.url();
  }

  async close() {
    await this.context.close();
    await this.browser.close();
  }
}
