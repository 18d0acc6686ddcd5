/**
 * Leveled logging passed explicitly into each component.
 *
 * Nothing here is process-wide: callers build a logger once and hand it to
 * the resolver, the carver and the batch service.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  critical(message: string): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50
}

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  critical: 'CRITICAL'
}

/** Where formatted lines go. Defaults to the global console. */
export interface LogSink {
  log(line: string): void
  error(line: string): void
}

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Default: 'info'. */
  level?: LogLevel
  sink?: LogSink
}

/** Format a line the way the tool prints it: `[LEVEL] message`. */
export function formatLogLine(level: LogLevel, message: string): string {
  return `[${LEVEL_LABEL[level]}] ${message}`
}

/**
 * Create a console-backed logger. Warnings and above go to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = 'info', sink = console } = options
  const threshold = LEVEL_RANK[level]

  const emit = (msgLevel: LogLevel, message: string): void => {
    if (LEVEL_RANK[msgLevel] < threshold) return
    const line = formatLogLine(msgLevel, message)
    if (LEVEL_RANK[msgLevel] >= LEVEL_RANK.warn) {
      sink.error(line)
    } else {
      sink.log(line)
    }
  }

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    critical: (message) => emit('critical', message)
  }
}

const noop = (): void => {}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  critical: noop
}

/** Thousands-separated byte count, e.g. `5,124`. */
export function formatBytes(value: bigint | number): string {
  return value.toLocaleString('en-US')
}
