import { indexBacks } from "./merge";
import { parseAudio, parseCount, parseDate, parseVideoUrl } from "./normalize";
import { BACK_FIELDS, FRONT_FIELDS, HEAVY_FIELDS, SEL } from "./selectors";
import type { BackHalf, BrowserDriver, FrontHalf, HeavyRecord, RawFragment } from "./types";

export interface ScrollBudget {
  maxScrolls: number;
  scrollPx: number;
  pause: () => Promise<void>;
}

export function field(fragment: RawFragment, name: string): string | null {
  const v = fragment[name];
  return v === undefined || v === "" ? null : v;
}

function imageUrl(fragment: RawFragment, name: string) {
  const src = field(fragment, name);
  if (!src || src.startsWith("data:")) return null;
  return src;
}

export async function collectFrontHalves(
  driver: BrowserDriver,
  options: ScrollBudget & { max: number; baseUrl: string },
): Promise<FrontHalf[]> {
  const byId = new Map<string, FrontHalf>();

  for (let pass = 0; ; pass++) {
    const before = byId.size;
    const rows = await driver.extract(SEL.publisher.item, FRONT_FIELDS);
    for (const row of rows) {
      if (byId.size >= options.max) break;
      const ref = parseVideoUrl(field(row, "href"), options.baseUrl);
      if (!ref || byId.has(ref.videoId)) continue;
      byId.set(ref.videoId, {
        videoId: ref.videoId,
        videoUrl: ref.videoUrl,
        thumbnailUrl: imageUrl(row, "thumbnail"),
        altText: field(row, "alt"),
        like: parseCount(field(row, "likes")),
      });
    }

    if (byId.size >= options.max || pass >= options.maxScrolls) break;
    if (pass > 0 && byId.size === before) break;
    await driver.scroll(options.scrollPx);
    await options.pause();
  }

  return Array.from(byId.values());
}

export async function collectBackHalves(
  driver: BrowserDriver,
  options: ScrollBudget & { wanted: ReadonlySet<string> },
): Promise<BackHalf[]> {
  const byKey = new Map<string, BackHalf>();

  for (let pass = 0; ; pass++) {
    const before = byKey.size;
    const rows = await driver.extract(SEL.feed.item, BACK_FIELDS);
    for (const row of rows) {
      const thumbnailUrl = imageUrl(row, "thumbnail");
      if (!thumbnailUrl || byKey.has(thumbnailUrl)) continue;
      byKey.set(thumbnailUrl, { thumbnailUrl, play: parseCount(field(row, "views")) });
    }

    const missing = Array.from(options.wanted).some((key) => !byKey.has(key));
    if (!missing || pass >= options.maxScrolls) break;
    if (pass > 0 && byKey.size === before) break;
    await driver.scroll(options.scrollPx);
    await options.pause();
  }

  return Array.from(byKey.values());
}

export async function extractHeavy(
  driver: BrowserDriver,
  front: FrontHalf,
  meta: { targetId: string; username: string; crawledAt: Date; baseUrl: string },
): Promise<HeavyRecord | null> {
  const [row] = await driver.extract(SEL.video.container, HEAVY_FIELDS);
  if (!row) return null;

  const title = field(row, "title");
  const shownUsername = field(row, "username");
  const like = parseCount(field(row, "likes"));
  const comment = parseCount(field(row, "comments"));
  const collect = parseCount(field(row, "collects"));
  const share = parseCount(field(row, "shares"));

  const hasCounts = [like, comment, collect, share].some((c) => c.text !== null);
  if (!title && !shownUsername && !hasCounts) return null;

  return {
    kind: "heavy",
    method: "video_page",
    targetId: meta.targetId,
    videoId: front.videoId,
    videoUrl: front.videoUrl,
    username: shownUsername?.replace(/^@/, "") ?? meta.username,
    nickname: field(row, "nickname"),
    title,
    thumbnailUrl: front.thumbnailUrl,
    postTime: parseDate(field(row, "postTime"), meta.crawledAt),
    play: null,
    like,
    comment,
    collect,
    share,
    audio: parseAudio(field(row, "audioHref"), field(row, "audioText"), meta.baseUrl),
    crawledAt: meta.crawledAt,
  };
}

/** Fills the play count the video page never shows from the creator feed. */
export function withFeedPlayCount(heavy: HeavyRecord, backs: BackHalf[]): HeavyRecord {
  if (heavy.thumbnailUrl === null) return heavy;
  const match = indexBacks(backs).get(heavy.thumbnailUrl);
  if (!match) return heavy;
  return { ...heavy, method: "video_page+creator_feed", play: match.play };
}
