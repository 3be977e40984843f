import type { Kysely } from "kysely";

export async function up(db: Kysely<any>) {
  await db.schema
    .createTable("crawler_identities")
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("username", "text", (col) => col.notNull())
    .addColumn("password", "text", (col) => col.notNull())
    .addColumn("proxy", "text")
    .addColumn("is_alive", "integer", (col) => col.notNull().defaultTo(1))
    .addColumn("last_used_at", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("target_accounts")
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("username", "text", (col) => col.notNull().unique())
    .addColumn("crawler_identity_id", "text", (col) =>
      col.references("crawler_identities.id").onDelete("set null"),
    )
    .addColumn("is_alive", "integer", (col) => col.notNull().defaultTo(1))
    .addColumn("priority", "integer", (col) => col.notNull().defaultTo(10))
    .addColumn("last_crawled_at", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("target_accounts_due_idx")
    .on("target_accounts")
    .columns(["is_alive", "priority", "last_crawled_at"])
    .execute();

  await db.schema
    .createTable("heavy_records")
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("target_id", "text", (col) => col.notNull())
    .addColumn("video_id", "text", (col) => col.notNull())
    .addColumn("video_url", "text", (col) => col.notNull())
    .addColumn("username", "text", (col) => col.notNull())
    .addColumn("nickname", "text")
    .addColumn("title", "text")
    .addColumn("thumbnail_url", "text")
    .addColumn("post_time_text", "text")
    .addColumn("post_time", "text")
    .addColumn("audio_url", "text")
    .addColumn("audio_id", "text")
    .addColumn("audio_title", "text")
    .addColumn("audio_author_name", "text")
    .addColumn("audio_info_text", "text")
    .addColumn("play_count_text", "text")
    .addColumn("play_count", "bigint")
    .addColumn("like_count_text", "text")
    .addColumn("like_count", "bigint")
    .addColumn("comment_count_text", "text")
    .addColumn("comment_count", "bigint")
    .addColumn("collect_count_text", "text")
    .addColumn("collect_count", "bigint")
    .addColumn("share_count_text", "text")
    .addColumn("share_count", "bigint")
    .addColumn("crawled_at", "text", (col) => col.notNull())
    .addColumn("crawling_method", "text", (col) => col.notNull())
    .execute();

  await db.schema.createIndex("heavy_records_video_idx").on("heavy_records").columns(["video_id", "crawled_at"]).execute();

  await db.schema
    .createTable("light_records")
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("target_id", "text", (col) => col.notNull())
    .addColumn("video_id", "text", (col) => col.notNull())
    .addColumn("video_url", "text", (col) => col.notNull())
    .addColumn("username", "text", (col) => col.notNull())
    .addColumn("thumbnail_url", "text")
    .addColumn("alt_text", "text")
    .addColumn("play_count_text", "text")
    .addColumn("play_count", "bigint")
    .addColumn("like_count_text", "text")
    .addColumn("like_count", "bigint")
    .addColumn("crawled_at", "text", (col) => col.notNull())
    .addColumn("crawling_method", "text", (col) => col.notNull())
    .execute();

  await db.schema.createIndex("light_records_video_idx").on("light_records").columns(["video_id", "crawled_at"]).execute();

  await db.schema
    .createTable("crawl_runs")
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("started_at", "text")
    .addColumn("finished_at", "text")
    .addColumn("config_json", "text", (col) => col.notNull())
    .addColumn("targets_attempted", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("targets_completed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("targets_failed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("heavy_saved", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("light_saved", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("last_error", "text")
    .execute();
}

export async function down(db: Kysely<any>) {
  await db.schema.dropTable("crawl_runs").execute();
  await db.schema.dropTable("light_records").execute();
  await db.schema.dropTable("heavy_records").execute();
  await db.schema.dropTable("target_accounts").execute();
  await db.schema.dropTable("crawler_identities").execute();
}
