import { z } from "zod";
import { ConfigError } from "./core/errors.ts";
import { DEFAULT_MAX_DEPTH } from "./core/types.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

export interface PostgresConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax: number;
}

export interface RelcheckConfig {
  maxDepth: number;
  checkTimeoutMs: number | null;
  logLevel: LogLevel;
  schemaPath: string | null;
  postgres: PostgresConfig;
}

const logLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && LOG_LEVELS.some((level) => level === value),
  { message: `Expected one of ${LOG_LEVELS.join(", ")}` },
);

const envSchema = z.object({
  RELCHECK_MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
  RELCHECK_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RELCHECK_LOG_LEVEL: logLevelSchema.default("info"),
  RELCHECK_SCHEMA_PATH: z.string().min(1).optional(),
  POSTGRES_HOST: z.string().min(1).default("localhost"),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().min(1).default("dev"),
  POSTGRES_PASSWORD: z.string().default("password"),
  POSTGRES_DB: z.string().min(1).default("dev"),
  POSTGRES_POOL_MAX: z.coerce.number().int().positive().default(10),
});

/** Read configuration from environment variables; empty strings count as unset */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RelcheckConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = result.data;
  return {
    maxDepth: vars.RELCHECK_MAX_DEPTH,
    checkTimeoutMs: vars.RELCHECK_CHECK_TIMEOUT_MS ?? null,
    logLevel: vars.RELCHECK_LOG_LEVEL,
    schemaPath: vars.RELCHECK_SCHEMA_PATH ?? null,
    postgres: {
      host: vars.POSTGRES_HOST,
      port: vars.POSTGRES_PORT,
      user: vars.POSTGRES_USER,
      password: vars.POSTGRES_PASSWORD,
      database: vars.POSTGRES_DB,
      poolMax: vars.POSTGRES_POOL_MAX,
    },
  };
}
