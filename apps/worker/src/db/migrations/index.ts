import type { Migration } from "kysely";
import * as init from "./001_init";
import * as leases from "./002_leases";

export const migrations: Record<string, Migration> = {
  "001_init": init,
  "002_leases": leases,
};
