/* eslint-disable no-console */
import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

/**
 * Reads a level name case-insensitively; unknown names give undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.trim().toLowerCase()
  return level !== undefined && isLogLevel(level) ? level : undefined
}

let currentLevel: LogLevel = parseLogLevel(process.env.IMGAUDIT_LOG_LEVEL) ?? 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function prefix(level: Exclude<LogLevel, 'silent'>): string {
  switch (level) {
    case 'debug':
      return pc.gray('[debug]')
    case 'info':
      return pc.cyan('[info]')
    case 'warn':
      return pc.yellow('[warn]')
    case 'error':
      return pc.red('[error]')
  }
}

function write(level: Exclude<LogLevel, 'silent'>, message: unknown, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return
  }
  // stdout is reserved for reports
  console.error(prefix(level), message, ...args)
}

export const logger = {
  debug: (message: unknown, ...args: unknown[]): void => write('debug', message, args),
  info: (message: unknown, ...args: unknown[]): void => write('info', message, args),
  warn: (message: unknown, ...args: unknown[]): void => write('warn', message, args),
  error: (message: unknown, ...args: unknown[]): void => write('error', message, args),
}

export type Logger = typeof logger
