// Leveled logger injected into every engine component.
// Renders "[YYYY-MM-DD HH:MM:SS] name LEVEL message" lines to stderr,
// coloring the level with picocolors when stderr is a TTY.
// Data stays on stdout (see output.ts); logs never go there.

import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
}

export interface Logger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
  critical(msg: string): void
  /** Logger with the same sink and level under a sub-name ("calmirror:team") */
  child(name: string): Logger
}

export interface LoggerOptions {
  name: string
  level?: LogLevel
  /** Defaults to process.stderr */
  write?: (line: string) => void
  color?: boolean
  now?: () => Date
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}

function paintLevel(level: LogLevel, color: boolean): string {
  const label = level.toUpperCase()
  if (!color) return label
  switch (level) {
    case 'debug': return pc.dim(label)
    case 'info': return pc.green(label)
    case 'warn': return pc.yellow(label)
    case 'error': return pc.red(label)
    case 'critical': return pc.bold(pc.red(label))
  }
}

export function createLogger({
  name,
  level = 'info',
  write = (line) => process.stderr.write(line),
  color = process.stderr.isTTY ?? false,
  now = () => new Date(),
}: LoggerOptions): Logger {
  const threshold = LEVEL_RANK[level]

  const log = (lvl: LogLevel) => (msg: string) => {
    if (LEVEL_RANK[lvl] < threshold) return
    const stamp = `[${formatTimestamp(now())}]`
    write(`${color ? pc.dim(stamp) : stamp} ${name} ${paintLevel(lvl, color)} ${msg}\n`)
  }

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    critical: log('critical'),
    child: (sub) => createLogger({ name: `${name}:${sub}`, level, write, color, now }),
  }
}

export function parseLogLevel(debug: boolean | undefined): LogLevel {
  return debug ? 'debug' : 'info'
}
