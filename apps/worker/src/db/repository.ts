import { sql, type ExpressionBuilder, type Kysely, type Selectable } from "kysely";
import type {
  CrawlRepository,
  CrawlerIdentity,
  HeavyRecord,
  Lease,
  LightRecord,
  TargetAccount,
} from "../crawler/types";
import { randomId } from "../lib/ids";
import type { CrawlerIdentityRow, Database, TargetAccountRow } from "./types";

function toIdentity(row: Selectable<CrawlerIdentityRow>): CrawlerIdentity {
  return {
    id: row.id,
    username: row.username,
    password: row.password,
    proxy: row.proxy,
    isAlive: row.is_alive === 1,
    lastUsedAt: row.last_used_at,
  };
}

function toTarget(row: Selectable<TargetAccountRow>): TargetAccount {
  return {
    id: row.id,
    username: row.username,
    crawlerIdentityId: row.crawler_identity_id,
    isAlive: row.is_alive === 1,
    priority: row.priority,
    lastCrawledAt: row.last_crawled_at,
  };
}

const leaseFree = (eb: ExpressionBuilder<Database, "crawler_identities">, lease: Lease) =>
  eb.or([
    eb("leased_by", "is", null),
    eb("leased_by", "=", lease.holder),
    eb("leased_until", "is", null),
    eb("leased_until", "<=", lease.now.toISOString()),
  ]);

// Unassigned, owned by `identityId`, or left behind by a dead identity.
const openTo = (eb: ExpressionBuilder<Database, "target_accounts">, identityId: string) =>
  eb.or([
    eb("crawler_identity_id", "is", null),
    eb("crawler_identity_id", "=", identityId),
    eb("crawler_identity_id", "in", eb.selectFrom("crawler_identities").select("id").where("is_alive", "=", 0)),
  ]);

export class KyselyCrawlRepository implements CrawlRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async nextIdentity(requestedId?: string, options: { exclude?: string[]; lease?: Lease } = {}) {
    const { lease } = options;
    const exclude = [...(options.exclude ?? [])];

    // A lost race re-reads with the contested identity excluded.
    while (true) {
      let q = this.db.selectFrom("crawler_identities").selectAll().where("is_alive", "=", 1);
      if (requestedId) q = q.where("id", "=", requestedId);
      if (exclude.length > 0) q = q.where("id", "not in", exclude);
      if (lease) q = q.where((eb) => leaseFree(eb, lease));

      const row = await q
        .orderBy(sql`case when last_used_at is null then 0 else 1 end`)
        .orderBy("last_used_at", "asc")
        .orderBy("id")
        .limit(1)
        .executeTakeFirst();
      if (!row) return null;
      if (!lease) return toIdentity(row);

      const result = await this.db
        .updateTable("crawler_identities")
        .set({ leased_by: lease.holder, leased_until: lease.until.toISOString() })
        .where("id", "=", row.id)
        .where("is_alive", "=", 1)
        .where((eb) => leaseFree(eb, lease))
        .executeTakeFirst();
      if (result.numUpdatedRows > 0n) return toIdentity(row);
      exclude.push(row.id);
    }
  }

  async renewIdentity(identityId: string, lease: Lease) {
    const result = await this.db
      .updateTable("crawler_identities")
      .set({ leased_by: lease.holder, leased_until: lease.until.toISOString() })
      .where("id", "=", identityId)
      .where((eb) => leaseFree(eb, lease))
      .executeTakeFirst();
    return result.numUpdatedRows > 0n;
  }

  async releaseIdentity(identityId: string, holder: string) {
    await this.db
      .updateTable("crawler_identities")
      .set({ leased_by: null, leased_until: null })
      .where("id", "=", identityId)
      .where("leased_by", "=", holder)
      .execute();
  }

  async nextTargets(identityId: string, max: number, recrawl: boolean) {
    let q = this.db
      .selectFrom("target_accounts")
      .selectAll()
      .where("is_alive", "=", 1)
      .where((eb) => openTo(eb, identityId));
    if (!recrawl) q = q.where("last_crawled_at", "is", null);

    const rows = await q
      .orderBy(sql`case when crawler_identity_id = ${identityId} then 0 else 1 end`)
      .orderBy("priority", "desc")
      .orderBy(sql`case when last_crawled_at is null then 0 else 1 end`)
      .orderBy("last_crawled_at", "asc")
      .orderBy("id")
      .limit(max)
      .execute();
    return rows.map(toTarget);
  }

  async saveHeavy(record: HeavyRecord) {
    await this.db
      .insertInto("heavy_records")
      .values({
        id: randomId("heavy"),
        target_id: record.targetId,
        video_id: record.videoId,
        video_url: record.videoUrl,
        username: record.username,
        nickname: record.nickname,
        title: record.title,
        thumbnail_url: record.thumbnailUrl,
        post_time_text: record.postTime.text,
        post_time: record.postTime.value?.toISOString() ?? null,
        audio_url: record.audio?.url ?? null,
        audio_id: record.audio?.id ?? null,
        audio_title: record.audio?.title ?? null,
        audio_author_name: record.audio?.authorName ?? null,
        audio_info_text: record.audio?.infoText ?? null,
        play_count_text: record.play?.text ?? null,
        play_count: record.play?.value ?? null,
        like_count_text: record.like.text,
        like_count: record.like.value,
        comment_count_text: record.comment.text,
        comment_count: record.comment.value,
        collect_count_text: record.collect.text,
        collect_count: record.collect.value,
        share_count_text: record.share.text,
        share_count: record.share.value,
        crawled_at: record.crawledAt.toISOString(),
        crawling_method: record.method,
      })
      .execute();
  }

  async saveLight(records: LightRecord[]) {
    if (records.length === 0) return;
    await this.db
      .insertInto("light_records")
      .values(
        records.map((r) => ({
          id: randomId("light"),
          target_id: r.targetId,
          video_id: r.videoId,
          video_url: r.videoUrl,
          username: r.username,
          thumbnail_url: r.thumbnailUrl,
          alt_text: r.altText,
          play_count_text: r.play?.text ?? null,
          play_count: r.play?.value ?? null,
          like_count_text: r.like.text,
          like_count: r.like.value,
          crawled_at: r.crawledAt.toISOString(),
          crawling_method: r.method,
        })),
      )
      .execute();
  }

  async markTargetDead(targetId: string) {
    await this.db.updateTable("target_accounts").set({ is_alive: 0 }).where("id", "=", targetId).execute();
  }

  async touchTarget(targetId: string, at: Date) {
    const iso = at.toISOString();
    await this.db
      .updateTable("target_accounts")
      .set({ last_crawled_at: iso })
      .where("id", "=", targetId)
      .where((eb) => eb.or([eb("last_crawled_at", "is", null), eb("last_crawled_at", "<", iso)]))
      .execute();
  }

  async assignTarget(targetId: string, identityId: string, claim: Pick<Lease, "now" | "until">) {
    const result = await this.db
      .updateTable("target_accounts")
      .set({ crawler_identity_id: identityId, claimed_until: claim.until.toISOString() })
      .where("id", "=", targetId)
      .where((eb) => openTo(eb, identityId))
      .where((eb) => eb.or([eb("claimed_until", "is", null), eb("claimed_until", "<=", claim.now.toISOString())]))
      .executeTakeFirst();
    return result.numUpdatedRows > 0n;
  }

  async releaseTarget(targetId: string, identityId: string, options: { unassign: boolean }) {
    await this.db
      .updateTable("target_accounts")
      .set(options.unassign ? { claimed_until: null, crawler_identity_id: null } : { claimed_until: null })
      .where("id", "=", targetId)
      .where("crawler_identity_id", "=", identityId)
      .execute();
  }

  async markIdentityDead(identityId: string) {
    await this.db.updateTable("crawler_identities").set({ is_alive: 0 }).where("id", "=", identityId).execute();
  }

  async touchIdentity(identityId: string, at: Date) {
    const iso = at.toISOString();
    await this.db
      .updateTable("crawler_identities")
      .set({ last_used_at: iso })
      .where("id", "=", identityId)
      .where((eb) => eb.or([eb("last_used_at", "is", null), eb("last_used_at", "<", iso)]))
      .execute();
  }
}
