import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const QUERY_TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const QUERY_FALSE_VALUES = new Set(["0", "false", "no", "off", ""]);

function coerceBoolean(value: unknown): unknown {
  if (typeof value === "boolean") return value;
  const raw = String(value ?? "")
    .trim()
    .toLowerCase();
  if (QUERY_TRUE_VALUES.has(raw)) return true;
  if (QUERY_FALSE_VALUES.has(raw)) return false;
  return value;
}

function emptyAsUndefined(value: unknown): unknown {
  if (value === undefined || value === null) return undefined;
  const s = String(value).trim();
  return s ? s : undefined;
}

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  NODE_ENV: z.string().default("development"),
  CORS_ORIGIN: z.string().default(""),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  STORAGE_DRIVER: z.enum(["json", "postgres"]).default("json"),
  DATA_DIR: z.string().trim().min(1).default("data"),
  DATABASE_URL: z.preprocess(emptyAsUndefined, z.string().optional()),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  SEED_JSON_PATH: z.preprocess(emptyAsUndefined, z.string().optional()),

  AI_BASE_URL: z
    .string()
    .trim()
    .default("http://127.0.0.1:8000")
    .transform((v) => v.replace(/\/$/, "")),
  AI_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),

  FACE_MATCH_METRIC: z.enum(["euclidean", "cosine"]).default("euclidean"),
  FACE_MATCH_THRESHOLD: z.coerce.number().nonnegative().finite().default(0.6),
  FACE_MATCH_MODE: z.enum(["verify", "search"]).default("verify"),
  REJECT_OUT_OF_WINDOW: z.preprocess(coerceBoolean, z.boolean()).default(true),
  REPEAT_SCAN_WINDOW_SEC: z.coerce.number().int().min(0).max(86_400).default(300),

  TIMEZONE: z
    .string()
    .trim()
    .default("UTC")
    .refine(isTimeZone, { message: "Unknown IANA time zone" }),
  SHIFT_SCHEDULE_PATH: z.preprocess(emptyAsUndefined, z.string().optional()),
  ATT_EVENTS_MAX: z.coerce.number().int().min(0).default(500),
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

/**
 * Parse configuration from an env-like object.
 * Throws with every offending key listed so startup fails fast.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const cfg = parsed.data;
  if (cfg.STORAGE_DRIVER === "postgres" && !cfg.DATABASE_URL) {
    throw new Error("Invalid configuration: DATABASE_URL is required when STORAGE_DRIVER=postgres");
  }
  return Object.freeze(cfg);
}

export const config = loadConfig();

export default config;
