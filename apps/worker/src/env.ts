import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const flag = (fallback: "0" | "1") =>
  z
    .enum(["0", "1", "true", "false"])
    .default(fallback)
    .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
  PORT: z.coerce.number().default(4000),
  DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().default("./data.db"),
  DB_DIALECT: z.enum(["sqlite", "postgres"]).default("sqlite"),
  PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH: z.string().optional(),
  PLAYWRIGHT_USER_AGENT: z
    .string()
    .default(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
    ),
  PLAYWRIGHT_LOCALE: z.string().default("en-US"),
  HEADLESS: flag("1"),
  CRAWL_BASE_URL: z.string().url().default("https://www.tiktok.com"),
  CRAWL_LOGIN: flag("1"),
  CRAWL_STEP_TIMEOUT_MS: z.coerce.number().int().min(1000).default(15000),
  CRAWL_MAX_SCROLLS: z.coerce.number().int().min(0).default(10),
  CRAWL_SCROLL_PX: z.coerce.number().int().min(100).default(2400),
  CRAWL_DELAY_MIN_MS: z.coerce.number().int().min(0).default(2000),
  CRAWL_DELAY_MAX_MS: z.coerce.number().int().min(0).default(5000),
  CRAWL_KEY_DELAY_MS: z.coerce.number().int().min(0).default(120),
  CRAWL_LEASE_MS: z.coerce.number().int().min(1000).default(600_000),
  CRAWL_TARGET_BUDGET: z.coerce.number().int().min(1).default(50),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
