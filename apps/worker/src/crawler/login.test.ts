import { describe, expect, it } from "vitest";
import { FakeDriver, type FakeSite } from "../testing/fake-driver";
import { identity } from "../testing/memory-repository";
import { signIn } from "./login";
import { SEL } from "./selectors";

const BASE = "https://www.tiktok.com";
const options = { baseUrl: BASE, stepTimeoutMs: 1000, pause: async () => {} };

async function attempt(login: FakeSite["login"]) {
  const driver = new FakeDriver({ baseUrl: BASE, publishers: [], login });
  const result = await signIn(driver, identity("i1"), options);
  return { driver, result };
}

describe("signIn", () => {
  it("fills the form and sees the profile icon", async () => {
    const { driver, result } = await attempt("ok");
    expect(result).toBe("SignedIn");
    expect(driver.actions[0]).toBe("navigate https://www.tiktok.com/login/phone-or-email/email");
    expect(driver.filled).toEqual({
      [SEL.login.username]: "i1@example.test",
      [SEL.login.password]: "test-secret",
    });
  });

  it("reports a rejected login", async () => {
    expect((await attempt("reject")).result).toBe("Rejected");
  });

  it("reports a challenge after submit", async () => {
    expect((await attempt("challenge")).result).toBe("ChallengeScreen");
  });

  it("reports a form that never answers as stuck", async () => {
    expect((await attempt("stuck")).result).toBe("NavigationStuck");
  });

  it("turns driver failures into a stuck sign-in", async () => {
    class DeadDriver extends FakeDriver {
      async navigate(): Promise<void> {
        throw new Error("net::ERR_PROXY_CONNECTION_FAILED");
      }
    }
    const driver = new DeadDriver({ baseUrl: BASE, publishers: [] });
    expect(await signIn(driver, identity("i1"), options)).toBe("NavigationStuck");
  });
});
