import type { ColumnType } from "kysely";

export type CrawlRunStatus = "queued" | "running" | "paused" | "completed" | "aborted" | "failed" | "cancelled";

/** 0/1 so the same column works on SQLite and Postgres. */
export type Flag = 0 | 1;

// bigint columns: pg hands int8 back as text.
export type Count = ColumnType<number | string | null, number | null, number | null>;

// Lease columns are optional on insert.
export type LeaseColumn = ColumnType<string | null, string | null | undefined, string | null>;

export interface CrawlerIdentityRow {
  id: string;
  username: string;
  password: string;
  proxy: string | null;
  is_alive: Flag;
  last_used_at: string | null;
  /** Crawl run holding the identity, until `leased_until`. */
  leased_by: LeaseColumn;
  leased_until: LeaseColumn;
  created_at: string;
}

export interface TargetAccountRow {
  id: string;
  username: string;
  crawler_identity_id: string | null;
  is_alive: Flag;
  priority: number;
  last_crawled_at: string | null;
  /** Set while a session holds the target. */
  claimed_until: LeaseColumn;
  created_at: string;
}

export interface HeavyRecordRow {
  id: string;
  target_id: string;
  video_id: string;
  video_url: string;
  username: string;
  nickname: string | null;
  title: string | null;
  thumbnail_url: string | null;
  post_time_text: string | null;
  post_time: string | null;
  audio_url: string | null;
  audio_id: string | null;
  audio_title: string | null;
  audio_author_name: string | null;
  audio_info_text: string | null;
  play_count_text: string | null;
  play_count: Count;
  like_count_text: string | null;
  like_count: Count;
  comment_count_text: string | null;
  comment_count: Count;
  collect_count_text: string | null;
  collect_count: Count;
  share_count_text: string | null;
  share_count: Count;
  crawled_at: string;
  crawling_method: string;
}

export interface LightRecordRow {
  id: string;
  target_id: string;
  video_id: string;
  video_url: string;
  username: string;
  thumbnail_url: string | null;
  alt_text: string | null;
  play_count_text: string | null;
  play_count: Count;
  like_count_text: string | null;
  like_count: Count;
  crawled_at: string;
  crawling_method: string;
}

export interface CrawlRunRow {
  id: string;
  status: CrawlRunStatus;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  config_json: string;
  targets_attempted: number;
  targets_completed: number;
  targets_failed: number;
  heavy_saved: number;
  light_saved: number;
  last_error: string | null;
}

export interface Database {
  crawler_identities: CrawlerIdentityRow;
  target_accounts: TargetAccountRow;
  heavy_records: HeavyRecordRow;
  light_records: LightRecordRow;
  crawl_runs: CrawlRunRow;
}
