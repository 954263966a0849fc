import { getLogLevel, type LogLevel } from "./config"

export type LogMeta = Record<string, unknown>

export interface Logger {
  debug(msg: string, meta?: LogMeta): void
  info(msg: string, meta?: LogMeta): void
  warn(msg: string, meta?: LogMeta): void
  error(msg: string, meta?: LogMeta): void
}

/** Where lines go (default: the global console) */
export type LogSink = Pick<Console, "log" | "warn" | "error">

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Simple structured logger.
 * Each line is one object: { level, timestamp, scope, msg, ...meta }
 */
export function createLogger(
  scope: string,
  level: LogLevel = getLogLevel(),
  sink: LogSink = console
): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level]
  const line = (l: LogLevel, msg: string, meta: LogMeta) => ({
    level: l,
    timestamp: new Date().toISOString(),
    scope,
    msg,
    ...meta,
  })

  return {
    debug: (msg, meta = {}) => {
      if (enabled("debug")) sink.log(line("debug", msg, meta))
    },
    info: (msg, meta = {}) => {
      if (enabled("info")) sink.log(line("info", msg, meta))
    },
    warn: (msg, meta = {}) => {
      if (enabled("warn")) sink.warn(line("warn", msg, meta))
    },
    error: (msg, meta = {}) => {
      if (enabled("error")) sink.error(line("error", msg, meta))
    },
  }
}

/** Logger that drops everything, handy for tests */
export const silentLogger: Logger = createLogger("silent", "silent")
