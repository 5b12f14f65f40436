import { pino } from "pino"
import type { Logger } from "pino"

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent"

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Resolve the SDK log level: explicit value first, then `TASKLANE_LOG_LEVEL`,
 * then "info". Unknown names fall back to "info".
 */
export function resolveLogLevel(
  level?: string,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const candidate = level ?? env["TASKLANE_LOG_LEVEL"]
  if (candidate && isLogLevel(candidate)) {
    return candidate
  }
  return "info"
}

/**
 * Create the root logger used when the caller does not supply one.
 */
export function createLogger(level?: string): Logger {
  return pino({
    name: "tasklane-sdk",
    level: resolveLogLevel(level),
  })
}

export function createChildLogger(
  parent: Logger,
  module: string,
): Logger {
  return parent.child({ module })
}
