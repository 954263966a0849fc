import { z } from "zod"

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"])
export type LogLevel = z.infer<typeof LogLevelSchema>

/**
 * Log level alone, for loggers built before (or without) the full config.
 * Unknown or blank values fall back to "info".
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return LogLevelSchema.catch("info").parse(env.LOG_LEVEL?.trim() || undefined)
}

/** Raw env schema */
const envSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default("info"),
  ACTIVITY_RETENTION_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1_000),
  JANITOR_INTERVAL_MS: z.coerce.number().int().min(1_000).default(60_000),
  HIGH_SEVERITY_THRESHOLD: z.coerce.number().min(0).default(50),
})

export interface AppConfig {
  logLevel: LogLevel
  /** findings older than this are purged by the janitor */
  activityRetentionMs: number
  janitorIntervalMs: number
  highSeverityThreshold: number
}

/**
 * Read configuration from the environment.
 * Empty strings count as unset so `FOO=` falls back to the default.
 * @throws ZodError when a variable is present but invalid
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, string> = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value.trim() !== "") raw[key] = value.trim()
  }
  const parsed = envSchema.parse(raw)
  return {
    logLevel: parsed.LOG_LEVEL,
    activityRetentionMs: parsed.ACTIVITY_RETENTION_MS,
    janitorIntervalMs: parsed.JANITOR_INTERVAL_MS,
    highSeverityThreshold: parsed.HIGH_SEVERITY_THRESHOLD,
  }
}
