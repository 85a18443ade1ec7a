import { z } from "zod";
import type { IngestSettings } from "./types.js";
import { parseMonth } from "./utils.js";

export const DEFAULT_STATION_ID = 27174;
export const DEFAULT_LOCATION = "Winnipeg";
export const DEFAULT_DB_PATH = "./data/weather.sqlite3";
export const DEFAULT_PAUSE_MS = 400;
export const DEFAULT_FETCH_TIMEOUT_MS = 25000;
export const DEFAULT_USER_AGENT = "weather-ingest/1.0 (+daily temperature archive)";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const monthString = z
  .string()
  .refine((value) => parseMonth(value) !== null, "expected YYYY-MM");

const envObject = z.object({
  STATION_ID: z.coerce.number().int().positive().default(DEFAULT_STATION_ID),
  LOCATION: z.string().min(1).default(DEFAULT_LOCATION),
  DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  PAUSE_MS: z.coerce.number().int().nonnegative().default(DEFAULT_PAUSE_MS),
  FETCH_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_FETCH_TIMEOUT_MS),
  TRANSIENT_RETRIES: z.coerce.number().int().nonnegative().default(0),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  INGEST_MODE: z
    .enum(["backwards", "last", "range", "month", "latest", "purge"])
    .default("last"),
  INGEST_MONTHS: z.coerce.number().int().positive().default(12),
  LATEST_ROWS: z.coerce.number().int().positive().default(10),
  INGEST_FROM: monthString.optional(),
  INGEST_TO: monthString.optional(),
  REFRESH_MINUTES: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

const envSchema = envObject.superRefine((env, ctx) => {
  if ((env.INGEST_MODE === "range" || env.INGEST_MODE === "month") && !env.INGEST_FROM) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["INGEST_FROM"],
      message: `required when INGEST_MODE is ${env.INGEST_MODE}`,
    });
  }
});

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): IngestSettings {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(envObject.shape)) {
    raw[key] = getEnvVar(env, key);
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const from = parsed.INGEST_FROM ? parseMonth(parsed.INGEST_FROM) : null;
  const to = parsed.INGEST_TO ? parseMonth(parsed.INGEST_TO) : from;

  return {
    stationId: parsed.STATION_ID,
    location: parsed.LOCATION,
    dbPath: parsed.DB_PATH,
    pauseMs: parsed.PAUSE_MS,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    transientRetries: parsed.TRANSIENT_RETRIES,
    userAgent: parsed.USER_AGENT,
    mode: parsed.INGEST_MODE,
    months: parsed.INGEST_MONTHS,
    latestRows: parsed.LATEST_ROWS,
    from,
    to,
    refreshMinutes: parsed.REFRESH_MINUTES ?? null,
    logLevel: parsed.LOG_LEVEL,
  };
}
