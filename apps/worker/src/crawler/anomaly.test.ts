import { describe, expect, it } from "vitest";
import { FakeDriver, fakeVideos, type FakePublisher } from "../testing/fake-driver";
import { AnomalyDetector } from "./anomaly";

const BASE = "https://www.tiktok.com";

async function inspectPublisher(patch: Partial<FakePublisher> = {}, maxScrolls = 3) {
  const driver = new FakeDriver({
    baseUrl: BASE,
    publishers: [{ username: "alice", videos: fakeVideos(2), ...patch }],
  });
  await driver.navigate(`${BASE}/@alice`);
  const detector = new AnomalyDetector(driver, { maxScrolls, scrollPx: 800, pause: async () => {} });
  const anomaly = await detector.inspect("PublisherPage");
  return { anomaly, scrolls: driver.actions.filter((a) => a.startsWith("scroll")).length };
}

describe("AnomalyDetector", () => {
  it("passes a publisher page with videos", async () => {
    expect(await inspectPublisher()).toEqual({ anomaly: "Normal", scrolls: 0 });
  });

  it("flags the challenge overlay", async () => {
    const { anomaly } = await inspectPublisher({ challengeOn: "PublisherPage" });
    expect(anomaly).toBe("ChallengeScreen");
  });

  it("flags challenge wording even without the overlay element", async () => {
    const { anomaly } = await inspectPublisher({ pageText: "Drag the slider to fit the puzzle" });
    expect(anomaly).toBe("ChallengeScreen");
  });

  it("flags a removed account by element or wording", async () => {
    expect((await inspectPublisher({ removed: true })).anomaly).toBe("AccountRemoved");
    expect((await inspectPublisher({ pageText: "Couldn't find this account" })).anomaly).toBe("AccountRemoved");
  });

  it("treats an unknown publisher as removed", async () => {
    const driver = new FakeDriver({ baseUrl: BASE, publishers: [] });
    await driver.navigate(`${BASE}/@ghost`);
    const detector = new AnomalyDetector(driver, { maxScrolls: 3, scrollPx: 800, pause: async () => {} });
    expect(await detector.inspect("PublisherPage")).toBe("AccountRemoved");
  });

  it("scrolls for lazily rendered items before calling the page empty", async () => {
    expect(await inspectPublisher({ itemsAfterScrolls: 2 })).toEqual({ anomaly: "Normal", scrolls: 2 });
    expect(await inspectPublisher({ videos: [] })).toEqual({ anomaly: "EmptyContent", scrolls: 3 });
  });

  it("only checks for challenges on video screens", async () => {
    const driver = new FakeDriver({
      baseUrl: BASE,
      publishers: [{ username: "alice", videos: fakeVideos(2), pageText: "Couldn't find this account" }],
    });
    await driver.navigate(`${BASE}/@alice`);
    const detector = new AnomalyDetector(driver, { maxScrolls: 3, scrollPx: 800, pause: async () => {} });
    expect(await detector.inspect("VideoPage")).toBe("Normal");
  });
});
