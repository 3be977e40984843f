export type NavState = "AnyPage" | "PublisherPage" | "VideoPage" | "VideoPageWithCreatorFeed";

export type Screen = Exclude<NavState, "AnyPage">;

export type Anomaly = "Normal" | "AccountRemoved" | "ChallengeScreen" | "EmptyContent";

export type AbortReason =
  | "AccountRemoved"
  | "ChallengeScreen"
  | "NavigationStuck"
  | "EmptyContent"
  | "NoUsableData";

export type CrawlMode = "light" | "heavy" | "both";

/** Raw text as displayed, next to the value parsed from it. */
export interface ParsedText<T> {
  text: string | null;
  value: T | null;
}

export type CountText = ParsedText<number>;
export type DateText = ParsedText<Date>;

export interface FieldSpec {
  /** Relative to the matched element; the element itself when omitted. */
  selector?: string;
  /** Attribute to read; trimmed text content when omitted. */
  attr?: string;
}

export type ExtractSpec = Record<string, FieldSpec>;

export type RawFragment = Record<string, string | null>;

export interface BrowserDriver {
  navigate(url: string): Promise<void>;
  click(locator: string): Promise<void>;
  fill(locator: string, value: string): Promise<void>;
  scroll(amount: number): Promise<void>;
  /** Resolves false on timeout; other driver failures reject. */
  waitFor(locator: string, timeoutMs: number): Promise<boolean>;
  exists(locator: string): Promise<boolean>;
  extract(locator: string, fields: ExtractSpec): Promise<RawFragment[]>;
  pageText(): Promise<string>;
  currentUrl(): Promise<string>;
  close(): Promise<void>;
}

export interface CrawlerIdentity {
  id: string;
  username: string;
  password: string;
  proxy: string | null;
  isAlive: boolean;
  lastUsedAt: string | null;
}

export interface TargetAccount {
  id: string;
  username: string;
  crawlerIdentityId: string | null;
  isAlive: boolean;
  priority: number;
  lastCrawledAt: string | null;
}

export interface FrontHalf {
  videoId: string;
  videoUrl: string;
  thumbnailUrl: string | null;
  altText: string | null;
  like: CountText;
}

export interface BackHalf {
  thumbnailUrl: string;
  play: CountText;
}

export interface AudioInfo {
  url: string | null;
  id: string | null;
  title: string | null;
  authorName: string | null;
  infoText: string | null;
}

interface HeavyFields {
  kind: "heavy";
  targetId: string;
  videoId: string;
  videoUrl: string;
  username: string;
  nickname: string | null;
  title: string | null;
  thumbnailUrl: string | null;
  postTime: DateText;
  like: CountText;
  comment: CountText;
  collect: CountText;
  share: CountText;
  audio: AudioInfo | null;
  crawledAt: Date;
}

export type HeavyRecord =
  | (HeavyFields & { method: "video_page"; play: null })
  | (HeavyFields & { method: "video_page+creator_feed"; play: CountText });

interface LightFields {
  kind: "light";
  targetId: string;
  videoId: string;
  videoUrl: string;
  username: string;
  thumbnailUrl: string | null;
  altText: string | null;
  like: CountText;
  crawledAt: Date;
}

export type LightRecord =
  | (LightFields & { method: "publisher_listing"; play: null })
  | (LightFields & { method: "publisher_listing+creator_feed"; play: CountText });

/** A time-boxed reservation held by one crawl run. */
export interface Lease {
  holder: string;
  now: Date;
  until: Date;
}

export interface CrawlRepository {
  /**
   * Least recently used alive identity. With `lease`, only identities nobody
   * else holds are eligible and the returned one is reserved for `lease.holder`.
   */
  nextIdentity(
    requestedId?: string,
    options?: { exclude?: string[]; lease?: Lease },
  ): Promise<CrawlerIdentity | null>;
  /** Extends a lease; false once another holder has taken the identity. */
  renewIdentity(identityId: string, lease: Lease): Promise<boolean>;
  releaseIdentity(identityId: string, holder: string): Promise<void>;
  /** Targets owned by a dead identity count as unassigned. */
  nextTargets(identityId: string, max: number, recrawl: boolean): Promise<TargetAccount[]>;
  saveHeavy(record: HeavyRecord): Promise<void>;
  saveLight(records: LightRecord[]): Promise<void>;
  markTargetDead(targetId: string): Promise<void>;
  /** Only moves `last_crawled_at` forward. */
  touchTarget(targetId: string, at: Date): Promise<void>;
  /**
   * Claims the target for one session until `claim.until`. False when a live
   * identity other than `identityId` owns it, or a session still holds it.
   */
  assignTarget(targetId: string, identityId: string, claim: Pick<Lease, "now" | "until">): Promise<boolean>;
  /** Ends the session claim; `unassign` also hands the target back to the pool. */
  releaseTarget(targetId: string, identityId: string, options: { unassign: boolean }): Promise<void>;
  markIdentityDead(identityId: string): Promise<void>;
  touchIdentity(identityId: string, at: Date): Promise<void>;
}
