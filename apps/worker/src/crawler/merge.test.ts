import { describe, expect, it } from "vitest";
import { mergeLightFragments } from "./merge";
import type { BackHalf, FrontHalf } from "./types";

const meta = { targetId: "t1", username: "alice", crawledAt: new Date("2024-03-10T12:00:00Z") };

const front = (id: string, thumbnailUrl: string | null): FrontHalf => ({
  videoId: id,
  videoUrl: `https://www.tiktok.com/@alice/video/${id}`,
  thumbnailUrl,
  altText: `clip ${id}`,
  like: { text: "1K", value: 1000 },
});

const back = (thumbnailUrl: string, play: string, value: number | null): BackHalf => ({
  thumbnailUrl,
  play: { text: play, value },
});

describe("mergeLightFragments", () => {
  it("joins halves on the thumbnail", () => {
    const records = mergeLightFragments([front("1", "a.jpg"), front("2", "b.jpg")], [back("b.jpg", "20K", 20_000)], meta);
    expect(records).toHaveLength(2);
    expect(records[0]).toMatchObject({ videoId: "1", method: "publisher_listing", play: null });
    expect(records[1]).toMatchObject({
      videoId: "2",
      method: "publisher_listing+creator_feed",
      play: { text: "20K", value: 20_000 },
      like: { text: "1K", value: 1000 },
      username: "alice",
      targetId: "t1",
    });
  });

  it("does not depend on the order of either side", () => {
    const fronts = [front("1", "a.jpg"), front("2", "b.jpg"), front("3", "c.jpg")];
    const backs = [back("a.jpg", "1", 1), back("c.jpg", "3", 3), back("b.jpg", "2", 2)];

    const key = (r: { videoId: string; play: { value: number | null } | null }) => `${r.videoId}:${r.play?.value}`;
    const forward = mergeLightFragments(fronts, backs, meta).map(key).sort();
    const reversed = mergeLightFragments([...fronts].reverse(), [...backs].reverse(), meta).map(key).sort();
    expect(forward).toEqual(["1:1", "2:2", "3:3"]);
    expect(reversed).toEqual(forward);
  });

  it("drops backs that match no front", () => {
    const records = mergeLightFragments([front("1", "a.jpg")], [back("zzz.jpg", "9", 9)], meta);
    expect(records).toHaveLength(1);
    expect(records[0].method).toBe("publisher_listing");
  });

  it("keeps fronts without a thumbnail unmatched", () => {
    const records = mergeLightFragments([front("1", null), front("2", null)], [back("a.jpg", "1", 1)], meta);
    expect(records.map((r) => r.videoId)).toEqual(["1", "2"]);
    expect(records.every((r) => r.play === null)).toBe(true);
  });

  it("keeps the first front of a duplicated thumbnail", () => {
    const records = mergeLightFragments([front("1", "a.jpg"), front("2", "a.jpg")], [back("a.jpg", "1", 1)], meta);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ videoId: "1", play: { value: 1 } });
  });

  it("picks the same back for a repeated thumbnail whatever the feed order", () => {
    const backs = [back("a.jpg", "1", 1), back("a.jpg", "20", 20), back("a.jpg", "?", null)];
    const forward = mergeLightFragments([front("1", "a.jpg")], backs, meta);
    const reversed = mergeLightFragments([front("1", "a.jpg")], [...backs].reverse(), meta);

    expect(forward[0].play).toEqual({ text: "20", value: 20 });
    expect(reversed).toEqual(forward);
  });

  it("returns nothing for an empty listing", () => {
    expect(mergeLightFragments([], [back("a.jpg", "1", 1)], meta)).toEqual([]);
  });
});
