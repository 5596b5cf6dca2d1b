/**
 * Application Configuration
 *
 * The environment is read exactly once into an `AppConfig` that is handed to
 * the migration gate, the session manager and the bot runtime. Nothing else
 * reads `process.env` for runtime settings.
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

export interface PoolConfig {
  readonly max: number;
  readonly acquireTimeoutMs: number;
  readonly busyTimeoutMs: number;
}

export interface MigrationConfig {
  readonly lockTimeoutMs: number;
  /** Age after which an unfinished revision is treated as abandoned rather than in progress. */
  readonly staleAfterMs: number;
  /** External migration command; when set it replaces the in-process migrator. */
  readonly command?: string;
}

export interface AppConfig {
  readonly environment: string;
  readonly databasePath: string;
  readonly botToken?: string;
  readonly defaultTimezone: string;
  readonly logLevel: LogLevel;
  readonly pool: PoolConfig;
  readonly migration: MigrationConfig;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  DATABASE_URL: z
    .string()
    .default("./sprout.db")
    .transform((value) => value.replace(/^file:(\/\/)?/, ""))
    .refine((value) => !/^[a-z][a-z0-9+.-]*:\/\//i.test(value), {
      message: "must be a SQLite file path (network URLs are not supported)",
    }),
  BOT_TOKEN: z.string().optional(),
  TIMEZONE_DEFAULT: z
    .string()
    .default("Europe/Amsterdam")
    .refine(isValidTimezone, { message: "must be an IANA timezone name" }),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
  DB_POOL_MAX: positiveInt.default(5),
  DB_POOL_ACQUIRE_TIMEOUT_MS: positiveInt.default(5_000),
  DB_BUSY_TIMEOUT_MS: nonNegativeInt.default(250),
  MIGRATION_LOCK_TIMEOUT_MS: nonNegativeInt.default(30_000),
  MIGRATION_STALE_AFTER_MS: positiveInt.default(600_000),
  MIGRATION_COMMAND: z.string().optional(),
});

/** Empty variables behave as unset, the way shell `VAR=` assignments are usually meant. */
function withoutEmptyValues(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Parse configuration from an environment map.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutEmptyValues(env));

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    environment: vars.NODE_ENV,
    databasePath: vars.DATABASE_URL,
    botToken: vars.BOT_TOKEN,
    defaultTimezone: vars.TIMEZONE_DEFAULT,
    logLevel: vars.LOG_LEVEL,
    pool: Object.freeze({
      max: vars.DB_POOL_MAX,
      acquireTimeoutMs: vars.DB_POOL_ACQUIRE_TIMEOUT_MS,
      busyTimeoutMs: vars.DB_BUSY_TIMEOUT_MS,
    }),
    migration: Object.freeze({
      lockTimeoutMs: vars.MIGRATION_LOCK_TIMEOUT_MS,
      staleAfterMs: vars.MIGRATION_STALE_AFTER_MS,
      command: vars.MIGRATION_COMMAND,
    }),
  });
}
