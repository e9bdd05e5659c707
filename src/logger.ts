/**
 * Logger
 *
 * Injected logging capability. Components take a Logger rather than reaching
 * for console, so tests can pass `silentLogger` or a recording double.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type Logger = {
  debug: (msg: string) => void
  info: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  /** Logger whose lines carry an extra `[name]` prefix. */
  child: (name: string) => Logger
}

type Sink = (level: LogLevel, line: string) => void

const consoleSink: Sink = (level, line) => {
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

function build(scope: string, minLevel: LogLevel, sink: Sink): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel)
  const emit = (level: LogLevel) => (msg: string) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return
    sink(level, `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${msg}`)
  }

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    child: (name) => build(`${scope}:${name}`, minLevel, sink),
  }
}

export function createConsoleLogger(level: LogLevel = 'info', scope = 'reminder', sink: Sink = consoleSink): Logger {
  return build(scope, level, sink)
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
