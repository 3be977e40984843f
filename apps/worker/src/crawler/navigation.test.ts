import { describe, expect, it } from "vitest";
import { FakeDriver, fakeVideos, type FakePublisher } from "../testing/fake-driver";
import { CrawlAbort, IllegalTransition } from "./errors";
import { Navigator, isLegalTransition } from "./navigation";

const BASE = "https://www.tiktok.com";
const noPause = async () => {};

function setup(patch: Partial<FakePublisher> = {}) {
  const driver = new FakeDriver({
    baseUrl: BASE,
    publishers: [{ username: "alice", videos: fakeVideos(3), ...patch }],
  });
  const navigator = new Navigator(driver, { baseUrl: BASE, stepTimeoutMs: 1000, pause: noPause });
  return { driver, navigator };
}

describe("isLegalTransition", () => {
  it("allows only the moves in the table", () => {
    expect(isLegalTransition("AnyPage", "PublisherPage")).toBe(true);
    expect(isLegalTransition("PublisherPage", "VideoPage")).toBe(true);
    expect(isLegalTransition("VideoPage", "VideoPageWithCreatorFeed")).toBe(true);
    expect(isLegalTransition("VideoPage", "PublisherPage")).toBe(true);
    expect(isLegalTransition("VideoPageWithCreatorFeed", "PublisherPage")).toBe(true);

    expect(isLegalTransition("AnyPage", "VideoPage")).toBe(false);
    expect(isLegalTransition("PublisherPage", "VideoPageWithCreatorFeed")).toBe(false);
    expect(isLegalTransition("VideoPageWithCreatorFeed", "VideoPage")).toBe(false);
    expect(isLegalTransition("PublisherPage", "AnyPage")).toBe(false);
  });
});

describe("Navigator", () => {
  it("walks publisher, video, creator feed and back", async () => {
    const { driver, navigator } = setup();
    await navigator.enter("alice");
    expect(navigator.state).toBe("PublisherPage");
    expect(driver.actions[0]).toBe("navigate https://www.tiktok.com/@alice");

    await navigator.go("VideoPage", "alice");
    await navigator.go("VideoPageWithCreatorFeed", "alice");
    expect(driver.showing).toBe("feed");

    await navigator.go("PublisherPage", "alice");
    expect(navigator.state).toBe("PublisherPage");
    expect(driver.showing).toBe("publisher");
  });

  it("refuses moves outside the table without touching the browser", async () => {
    const { driver, navigator } = setup();
    await expect(navigator.go("VideoPage", "alice")).rejects.toBeInstanceOf(IllegalTransition);
    expect(navigator.state).toBe("AnyPage");
    expect(driver.actions).toEqual([]);
  });

  it("reports a screen that never shows up as stuck", async () => {
    const { navigator } = setup({ stuckOn: "VideoPage" });
    await navigator.enter("alice");

    const err = await navigator.go("VideoPage", "alice").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CrawlAbort);
    expect(err).toMatchObject({ reason: "NavigationStuck" });
    expect(navigator.state).toBe("AnyPage");
  });

  it("counts a challenge overlay as arrival", async () => {
    const { navigator } = setup({ challengeOn: "PublisherPage" });
    await navigator.enter("alice");
    expect(navigator.state).toBe("PublisherPage");
  });

  it("counts a wording-only interstitial as arrival", async () => {
    const removed = setup({ stuckOn: "PublisherPage", pageText: "Couldn't find this account" });
    await removed.navigator.enter("alice");
    expect(removed.navigator.state).toBe("PublisherPage");

    const challenged = setup({ stuckOn: "VideoPage", pageText: "Drag the slider to fit the puzzle" });
    await challenged.navigator.enter("alice");
    await challenged.navigator.go("VideoPage", "alice");
    expect(challenged.navigator.state).toBe("VideoPage");
  });

  it("does not read removed-account wording off a video page", async () => {
    const { navigator } = setup({ stuckOn: "VideoPage", pageText: "Couldn't find this account" });
    await navigator.enter("alice");
    await expect(navigator.go("VideoPage", "alice")).rejects.toMatchObject({ reason: "NavigationStuck" });
  });

  it("settles by direct entry when the close control is covered", async () => {
    const { driver, navigator } = setup({ challengeOn: "VideoPage" });
    await navigator.enter("alice");
    await navigator.go("VideoPage", "alice");

    await expect(navigator.settle("alice")).resolves.toBe(true);
    expect(navigator.state).toBe("PublisherPage");
    expect(driver.showing).toBe("publisher");
    expect(driver.actions.filter((a) => a.startsWith("navigate"))).toHaveLength(2);
  });

  it("settle reports failure instead of throwing", async () => {
    const { navigator } = setup({ stuckOn: "PublisherPage" });
    await expect(navigator.enter("alice")).rejects.toMatchObject({ reason: "NavigationStuck" });
    await expect(navigator.settle("alice")).resolves.toBe(false);
  });
});
