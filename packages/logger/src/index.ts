import { appendFileSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"

export type LogLevel = "debug" | "info" | "success" | "warn" | "error"

/** Threshold names as written in CONFIG_LOG_LEVEL */
export type LogThreshold = "DEBUG" | "INFO" | "WARN" | "ERROR"

export interface LogContext {
  step?: string
  operation?: string
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  message: string
  context?: LogContext
  timestamp: Date
}

export type LogSink = (entry: LogEntry) => void

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
}

const THRESHOLD_PRIORITY: Record<LogThreshold, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
}

/** Severity tag written into every line. Success is an INFO line with a check mark. */
const LEVEL_TAG: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  success: "INFO",
  warn: "WARN",
  error: "ERROR",
}

const LEVEL_MARKER: Record<LogLevel, string> = {
  debug: "",
  info: "ℹ ",
  success: "✓ ",
  warn: "⚠ ",
  error: "✗ ",
}

const COLORS = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
  reset: "\x1b[0m",
}

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.blue,
  success: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
}

export const REDACTED = "********"

// =============================================================================
// Redaction
// =============================================================================

export interface Redactor {
  /** Register a secret value; every later log line has it masked */
  add(secret: string): void
  redact(text: string): string
}

/** Shorter values are not masked. Every secret source requires at least 8 characters. */
const MIN_SECRET_LENGTH = 4

export function createRedactor(): Redactor {
  const secrets = new Set<string>()

  return {
    add(secret) {
      if (secret.length >= MIN_SECRET_LENGTH) {
        secrets.add(secret)
      }
    },
    redact(text) {
      let out = text
      for (const secret of secrets) {
        out = out.split(secret).join(REDACTED)
      }
      return out
    },
  }
}

// =============================================================================
// Formatting
// =============================================================================

const pad = (n: number) => String(n).padStart(2, "0")

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

export function formatLogLine(entry: LogEntry): string {
  return `[${formatTimestamp(entry.timestamp)}] [${LEVEL_TAG[entry.level]}] ${LEVEL_MARKER[entry.level]}${entry.message}`
}

// =============================================================================
// Sinks
// =============================================================================

export function consoleSink(options: { color?: boolean } = {}): LogSink {
  const color = options.color ?? Boolean(process.stdout.isTTY)

  return entry => {
    const line = formatLogLine(entry)
    const text = color ? `${LEVEL_COLOR[entry.level]}${line}${COLORS.reset}` : line
    if (entry.level === "error" || entry.level === "warn") {
      console.error(text)
    } else {
      console.log(text)
    }
  }
}

/**
 * Append-only run log. Writes are synchronous so the file keeps the same order
 * as the console even when the process exits right after a fatal error.
 */
export function fileSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true, mode: 0o700 })

  return entry => {
    appendFileSync(path, `${formatLogLine(entry)}\n`, { mode: 0o600 })
  }
}

export interface MemorySink {
  sink: LogSink
  entries: LogEntry[]
  /** Rendered lines, as the file sink would write them */
  lines(): string[]
}

export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = []
  return {
    sink: entry => {
      entries.push(entry)
    },
    entries,
    lines: () => entries.map(formatLogLine),
  }
}

// =============================================================================
// Logger
// =============================================================================

export interface RunLogger {
  readonly redactor: Redactor
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  success(message: string, context?: LogContext): void
  warn(message: string, error?: unknown, context?: LogContext): void
  error(message: string, error?: unknown, context?: LogContext): void
  /** Logger that adds `context` to every entry */
  child(context: LogContext): RunLogger
}

export interface RunLoggerOptions {
  sinks: LogSink[]
  level?: LogThreshold
  redactor?: Redactor
  context?: LogContext
}

function describeError(error: unknown): string | undefined {
  if (error === undefined || error === null) return undefined
  if (error instanceof Error) return error.message
  return String(error)
}

export function createRunLogger(options: RunLoggerOptions): RunLogger {
  const { sinks, level = "INFO", redactor = createRedactor(), context: baseContext } = options
  const threshold = THRESHOLD_PRIORITY[level]

  const log = (entryLevel: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
    if (LEVEL_PRIORITY[entryLevel] < threshold) return

    const detail = describeError(error)
    const text = detail ? `${message}: ${detail}` : message
    const merged = baseContext || context ? { ...baseContext, ...context } : undefined

    const entry: LogEntry = {
      level: entryLevel,
      message: redactor.redact(text),
      context: merged,
      timestamp: new Date(),
    }
    for (const sink of sinks) {
      sink(entry)
    }
  }

  return {
    redactor,
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    success: (message, context) => log("success", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    child: context => createRunLogger({ sinks, level, redactor, context: { ...baseContext, ...context } }),
  }
}
