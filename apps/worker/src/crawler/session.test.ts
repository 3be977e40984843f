import { describe, expect, it } from "vitest";
import { FakeDriver, fakeVideos, type FakePublisher } from "../testing/fake-driver";
import { identity, target } from "../testing/memory-repository";
import { AnomalyDetector } from "./anomaly";
import { Navigator } from "./navigation";
import { SEL } from "./selectors";
import { runSession, type SessionContext } from "./session";
import type { CrawlMode } from "./types";

const BASE = "https://www.tiktok.com";
const crawledAt = new Date("2024-03-10T12:00:00Z");
const pause = async () => {};

class BrokenTextDriver extends FakeDriver {
  async pageText(): Promise<string> {
    throw new Error("target closed");
  }
}

function setup(patch: Partial<FakePublisher> = {}, mode: CrawlMode = "both", maxVideos = 3, broken = false) {
  const site = { baseUrl: BASE, publishers: [{ username: "alice", videos: fakeVideos(5), ...patch }] };
  const driver = broken ? new BrokenTextDriver(site) : new FakeDriver(site);
  const navigator = new Navigator(driver, { baseUrl: BASE, stepTimeoutMs: 1000, pause });
  const ctx: SessionContext = {
    driver,
    navigator,
    detector: new AnomalyDetector(driver, { maxScrolls: 3, scrollPx: 800, pause }),
    identity: identity("i1"),
    target: target("t1", { username: "alice" }),
    mode,
    maxVideos,
    baseUrl: BASE,
    maxScrolls: 3,
    scrollPx: 800,
    pause,
    now: () => crawledAt,
  };
  return { driver, navigator, ctx };
}

describe("runSession", () => {
  it("collects one heavy and up to N light records on a normal page", async () => {
    const { driver, ctx } = setup();
    const outcome = await runSession(ctx);

    expect(outcome.status).toBe("done");
    expect(outcome.phases).toEqual(["Start", "ListingCollected", "HeavyCollectionLoop", "LightMerged", "Done"]);
    expect(outcome.heavy).toMatchObject({
      videoId: "7300",
      method: "video_page+creator_feed",
      play: { text: "10K", value: 10_000 },
    });
    expect(outcome.light.map((r) => r.videoId)).toEqual(["7300", "7301", "7302"]);
    expect(outcome.light.every((r) => r.method === "publisher_listing+creator_feed")).toBe(true);
    expect(outcome.light[1].play).toEqual({ text: "20K", value: 20_000 });
    expect(outcome.settled).toBe(true);
    expect(driver.showing).toBe("publisher");
  });

  it("skips the video page fields in light mode", async () => {
    const { ctx } = setup({}, "light");
    const outcome = await runSession(ctx);
    expect(outcome.status).toBe("done");
    expect(outcome.heavy).toBeNull();
    expect(outcome.light).toHaveLength(3);
  });

  it("never opens the creator feed in heavy mode", async () => {
    const { driver, ctx } = setup({}, "heavy");
    const outcome = await runSession(ctx);
    expect(outcome.phases).toEqual(["Start", "ListingCollected", "HeavyCollectionLoop", "Done"]);
    expect(outcome.heavy).toMatchObject({ method: "video_page", play: null });
    expect(outcome.light).toEqual([]);
    expect(driver.actions).not.toContain(`click ${SEL.video.creatorVideos}`);
  });

  it("aborts on a removed account before extracting anything", async () => {
    const { ctx } = setup({ removed: true });
    const outcome = await runSession(ctx);
    expect(outcome).toMatchObject({ status: "aborted", reason: "AccountRemoved", phases: ["Start"], heavy: null, light: [] });
  });

  it("aborts on a challenge and still ends on the publisher page", async () => {
    const { driver, navigator, ctx } = setup({ challengeOn: "VideoPage" });
    const outcome = await runSession(ctx);
    expect(outcome).toMatchObject({ status: "aborted", reason: "ChallengeScreen", phases: ["Start", "ListingCollected"] });
    expect(outcome.heavy).toBeNull();
    expect(outcome.settled).toBe(true);
    expect(navigator.state).toBe("PublisherPage");
    expect(driver.showing).toBe("publisher");
  });

  it("aborts on an empty publisher page", async () => {
    const { ctx } = setup({ videos: [] });
    const outcome = await runSession(ctx);
    expect(outcome).toMatchObject({ status: "aborted", reason: "EmptyContent", phases: ["Start"] });
  });

  it("aborts with NoUsableData when heavy mode finds nothing on the video page", async () => {
    const { ctx } = setup({ heavy: null }, "heavy");
    const outcome = await runSession(ctx);
    expect(outcome).toMatchObject({
      status: "aborted",
      reason: "NoUsableData",
      phases: ["Start", "ListingCollected", "HeavyCollectionLoop"],
    });
  });

  it("keeps the heavy record when the creator feed never loads", async () => {
    const { ctx } = setup({ stuckOn: "VideoPageWithCreatorFeed" });
    const outcome = await runSession(ctx);
    expect(outcome).toMatchObject({ status: "aborted", reason: "NavigationStuck" });
    expect(outcome.heavy).toMatchObject({ videoId: "7300", method: "video_page" });
    expect(outcome.light).toEqual([]);
    expect(outcome.settled).toBe(true);
  });

  it("turns a driver failure inside a step into a stuck step", async () => {
    const { ctx } = setup({}, "both", 3, true);
    const outcome = await runSession(ctx);
    expect(outcome).toMatchObject({
      status: "aborted",
      reason: "NavigationStuck",
      detail: "inspect PublisherPage: target closed",
    });
  });
});
