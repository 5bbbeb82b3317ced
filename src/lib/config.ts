import { z } from "zod";
import { ConfigError } from "./error";
import type { LogLevel } from "./logger";

export const DEFAULTS = {
  model: "text-embedding-3-small",
  timeoutMs: 60_000,
  gas: 3,
  batchSize: 100,
  concurrency: 3,
} as const;

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const ConfigSchema = z.object({
  EMBED_MODEL: z
    .string()
    .nonempty("EMBED_MODEL must be a non-empty string")
    .default(DEFAULTS.model),
  EMBED_BASE_URL: z.string().url("EMBED_BASE_URL must be a URL").optional(),
  EMBED_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULTS.timeoutMs),
  EMBED_GAS: z.coerce.number().int().nonnegative().default(DEFAULTS.gas),
  EMBED_BATCH_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULTS.batchSize),
  EMBED_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULTS.concurrency),
  EMBED_TRACE: flag,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface EmbedConfig {
  model: string;
  baseURL?: string;
  timeoutMs: number;
  gas: number;
  batchSize: number;
  concurrency: number;
  trace: boolean;
  logLevel: LogLevel;
}

/** Read settings from the environment. Unset variables take their defaults. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EmbedConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new ConfigError(`${issue.path.join(".")}: ${issue.message}`);
  }

  const c = parsed.data;
  return {
    model: c.EMBED_MODEL,
    baseURL: c.EMBED_BASE_URL,
    timeoutMs: c.EMBED_TIMEOUT_MS,
    gas: c.EMBED_GAS,
    batchSize: c.EMBED_BATCH_SIZE,
    concurrency: c.EMBED_CONCURRENCY,
    trace: c.EMBED_TRACE,
    logLevel: c.LOG_LEVEL,
  };
}
