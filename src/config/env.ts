import { z } from "zod";

import { ConfigError, issuesFromZod } from "../core/errors.js";
import { DEFAULT_LOCALE, DEFAULT_TOP_WORDS_COUNT } from "../core/config.js";

const flag = z
  .enum(["0", "1", "true", "false"])
  .default("1")
  .transform((v) => v === "1" || v === "true");

const schema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  /** unset: chosen from NODE_ENV */
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  METRICS_ENABLED: flag,
  TOP_WORDS_COUNT: z.coerce.number().int().min(1).default(DEFAULT_TOP_WORDS_COUNT),
  MAX_FILE_SIZE: z.coerce.number().int().min(1).default(10_000_000),
  STOP_WORDS_FILE: z.string().min(1).optional(),
  ANALYZER_LOCALE: z.string().min(1).default(DEFAULT_LOCALE),
});

export type Env = z.infer<typeof schema>;

/** Parses process settings; call after `dotenv/config` has populated the environment. */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError("invalid environment", issuesFromZod(parsed.error));
  }
  return parsed.data;
}
