import { z } from "zod";
import { ConfigError } from "@/sync/errors";

const flag = z
  .string()
  .default("false")
  .transform((v) => v === "true");

const envSchema = z.object({
  // Portal scraping (remote browser is managed by Browserbase)
  SALON_BOARD_URL: z.string().optional(),
  SALON_BOARD_USERNAME: z.string().optional(),
  SALON_BOARD_PASSWORD: z.string().optional(),
  BROWSERBASE_API_KEY: z.string().optional(),
  BROWSERBASE_PROJECT_ID: z.string().optional(),

  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
  GOOGLE_REFRESH_TOKEN: z.string().optional(),
  GOOGLE_CALENDAR_ID: z.string().default("primary"),

  SALON_TIMEZONE: z.string().default("Asia/Tokyo"),

  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),
  SYNC_WINDOW_DAYS: z.coerce.number().int().positive().default(30),
  SYNC_INTERVAL_MINUTES: z.coerce.number().int().positive().default(5),
  SYNC_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
  SYNC_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(500),
  SYNC_RETRY_MAX_MS: z.coerce.number().int().nonnegative().default(30_000),
  SYNC_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  SYNC_SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  SYNC_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  SYNC_LEASE_TTL_MINUTES: z.coerce.number().int().positive().default(30),
  // Finished runs older than this are deleted from the ledger; 0 keeps them all.
  SYNC_RUN_RETENTION_DAYS: z.coerce.number().int().nonnegative().default(30),
  SYNC_RECREATE_EXTERNALLY_DELETED: flag,
  SYNC_DRY_RUN: flag,
  SYNC_LEDGER_PATH: z
    .string()
    .default("./sync_ledger.db"),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

export function getEnv(): SyncEnv {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const problems = result.error.issues
        .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
        .join("\n");
      throw new ConfigError(
        `Sync environment validation failed:\n${problems}\n\nCopy .env.example to .env.local and fill in the values.`
      );
    }
    _env = result.data;
  }
  return _env;
}

/** Drop the cached environment so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
