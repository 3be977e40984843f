import { errorMessage, type Logger } from "../lib/log";
import { LOGIN_PATH, SEL } from "./selectors";
import type { BrowserDriver, CrawlerIdentity } from "./types";

export type SignInResult = "SignedIn" | "ChallengeScreen" | "Rejected" | "NavigationStuck";

export interface SignInOptions {
  baseUrl: string;
  stepTimeoutMs: number;
  pause: () => Promise<void>;
  log?: Logger;
}

/**
 * Email/password form login. `Rejected` is the only result that says the
 * identity itself is unusable.
 */
export async function signIn(
  driver: BrowserDriver,
  identity: CrawlerIdentity,
  options: SignInOptions,
): Promise<SignInResult> {
  const { stepTimeoutMs, pause } = options;
  try {
    await driver.navigate(`${options.baseUrl.replace(/\/+$/, "")}${LOGIN_PATH}`);
    const formShown = await driver.waitFor([SEL.login.username, SEL.challenge].join(", "), stepTimeoutMs);
    if (!formShown) return "NavigationStuck";
    if (await driver.exists(SEL.challenge)) return "ChallengeScreen";

    await pause();
    await driver.fill(SEL.login.username, identity.username);
    await pause();
    await driver.fill(SEL.login.password, identity.password);
    await pause();
    await driver.click(SEL.login.submit);

    const answered = await driver.waitFor(
      [SEL.login.signedIn, SEL.login.error, SEL.challenge].join(", "),
      stepTimeoutMs,
    );
    if (!answered) return "NavigationStuck";
    if (await driver.exists(SEL.challenge)) return "ChallengeScreen";
    if (await driver.exists(SEL.login.signedIn)) return "SignedIn";
    return "Rejected";
  } catch (err) {
    options.log?.warn("sign-in interrupted", { identity: identity.id, error: errorMessage(err) });
    return "NavigationStuck";
  }
}
