import { parseArgs } from "node:util";
import { z } from "zod";
import type { CrawlRunInput } from "../jobs/crawl";

const CrawlArgsSchema = z.object({
  mode: z.enum(["light", "heavy", "both"]).default("both"),
  identity: z.string().min(1).optional(),
  "max-videos": z.coerce.number().int().min(1).default(30),
  "max-targets": z.coerce.number().int().min(1).default(10),
  recrawl: z.boolean().default(false),
  budget: z.coerce.number().int().min(1).optional(),
  identities: z.coerce.number().int().min(1).default(1),
});

/** `crawl` command line to a crawl run config. Throws on unknown flags or bad values. */
export function parseCrawlArgs(argv: string[]): CrawlRunInput {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      mode: { type: "string" },
      identity: { type: "string" },
      "max-videos": { type: "string" },
      "max-targets": { type: "string" },
      recrawl: { type: "boolean" },
      budget: { type: "string" },
      identities: { type: "string" },
    },
  });
  const args = CrawlArgsSchema.parse(values);
  return {
    mode: args.mode,
    identityId: args.identity,
    maxVideosPerTarget: args["max-videos"],
    maxTargets: args["max-targets"],
    recrawl: args.recrawl,
    budget: args.budget,
    identities: args.identities,
  };
}
