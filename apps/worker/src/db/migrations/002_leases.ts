import type { Kysely } from "kysely";

export async function up(db: Kysely<any>) {
  await db.schema.alterTable("crawler_identities").addColumn("leased_by", "text").execute();
  await db.schema.alterTable("crawler_identities").addColumn("leased_until", "text").execute();
  await db.schema.alterTable("target_accounts").addColumn("claimed_until", "text").execute();
}

export async function down(db: Kysely<any>) {
  await db.schema.alterTable("target_accounts").dropColumn("claimed_until").execute();
  await db.schema.alterTable("crawler_identities").dropColumn("leased_until").execute();
  await db.schema.alterTable("crawler_identities").dropColumn("leased_by").execute();
}
