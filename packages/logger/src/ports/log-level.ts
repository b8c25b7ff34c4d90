export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels.
 *
 * These values define the ordering of log levels for comparison
 * and filtering (higher = more severe). They match pino's numbering.
 */
export const LogLevels = {
  /** Finest-grained diagnostic information, e.g. every contribution seen. */
  Trace: 10,
  /** Per-source and per-item detail useful when a value is not what you expected. */
  Debug: 20,
  /** One line per completed parse. */
  Info: 30,
  /** Missing required items and other recoverable surprises. */
  Warn: 40,
  /** A parse failed. */
  Error: 50,
  /** The process cannot continue without configuration. */
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && logLevelNames.some((name) => name === value)
}
