import type { BackHalf, FrontHalf, LightRecord } from "./types";

export interface MergeMeta {
  targetId: string;
  username: string;
  crawledAt: Date;
}

// A thumbnail can repeat in the feed; the pick must not depend on feed order.
function preferred(a: BackHalf, b: BackHalf): BackHalf {
  const av = a.play.value;
  const bv = b.play.value;
  if (av !== bv) {
    if (av === null) return b;
    if (bv === null) return a;
    return av > bv ? a : b;
  }
  return (a.play.text ?? "") <= (b.play.text ?? "") ? a : b;
}

/** Creator-feed backs keyed by thumbnail, the highest play count winning a repeated key. */
export function indexBacks(back: BackHalf[]): Map<string, BackHalf> {
  const byKey = new Map<string, BackHalf>();
  for (const b of back) {
    const held = byKey.get(b.thumbnailUrl);
    byKey.set(b.thumbnailUrl, held ? preferred(held, b) : b);
  }
  return byKey;
}

/**
 * Joins listing fronts with creator-feed backs on the thumbnail URL.
 * One record per front, the first front with a given thumbnail winning; backs
 * without a front are dropped since nothing identifies their video.
 */
export function mergeLightFragments(front: FrontHalf[], back: BackHalf[], meta: MergeMeta): LightRecord[] {
  const backByKey = indexBacks(back);

  const seen = new Set<string>();
  const out: LightRecord[] = [];
  for (const f of front) {
    if (f.thumbnailUrl !== null) {
      if (seen.has(f.thumbnailUrl)) continue;
      seen.add(f.thumbnailUrl);
    }

    const base = {
      kind: "light" as const,
      targetId: meta.targetId,
      videoId: f.videoId,
      videoUrl: f.videoUrl,
      username: meta.username,
      thumbnailUrl: f.thumbnailUrl,
      altText: f.altText,
      like: f.like,
      crawledAt: meta.crawledAt,
    };
    const match = f.thumbnailUrl === null ? undefined : backByKey.get(f.thumbnailUrl);
    out.push(
      match
        ? { ...base, method: "publisher_listing+creator_feed", play: match.play }
        : { ...base, method: "publisher_listing", play: null },
    );
  }
  return out;
}
