/**
 * Subsystem loggers with level control and JSON-lines file output.
 *
 * Usage:
 *   import { createLogger } from '../infra/logger.js'
 *   const log = createLogger('tracker')
 *   log.info('Session opened', { roomId, recordId })
 *
 * Configuration via environment:
 *   LOG_LEVEL=debug|info|warn|error  (default: info)
 *   LOG_FILE=true|false              (default: true, writes to ~/.mention-tracker/logs/)
 *   LOG_DIR=<path>                   (overrides the log directory)
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
}

interface LogEntry {
  ts: string
  level: LogLevel
  sys: string
  msg: string
  data?: Record<string, unknown>
}

/* ------------------------------------------------------------------ */
/*  Level management                                                   */
/* ------------------------------------------------------------------ */

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

const currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info'

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

/* ------------------------------------------------------------------ */
/*  File output                                                        */
/* ------------------------------------------------------------------ */

const LOG_DIR = process.env.LOG_DIR || join(homedir(), '.mention-tracker', 'logs')
// Vitest sets VITEST; test runs stay off the user's log directory
let logFileEnabled = process.env.LOG_FILE !== 'false' && !process.env.VITEST

let logDirReady = false
function ensureLogDir(): boolean {
  if (logDirReady) return true
  try {
    mkdirSync(LOG_DIR, { recursive: true })
    logDirReady = true
  } catch (error) {
    logFileEnabled = false
    console.error(`Log directory ${LOG_DIR} unavailable, file logging disabled:`, error)
  }
  return logDirReady
}

function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0]
  return join(LOG_DIR, `mention-tracker-${date}.log`)
}

function writeToFile(entry: LogEntry): void {
  if (!logFileEnabled || !ensureLogDir()) return
  try {
    appendFileSync(getLogFilePath(), `${JSON.stringify(entry)}\n`)
  } catch (error) {
    logFileEnabled = false
    console.error('Log file write failed, file logging disabled:', error)
  }
}

/* ------------------------------------------------------------------ */
/*  Console output                                                     */
/* ------------------------------------------------------------------ */

const isTTY = process.stderr.isTTY

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // grey
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
}
const RESET = '\x1b[0m'

function formatConsole(entry: LogEntry): string {
  const time = entry.ts.split('T')[1]?.slice(0, 8) || entry.ts
  const lvl = entry.level.toUpperCase().padEnd(5)
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : ''

  if (isTTY) {
    return `${LEVEL_COLORS[entry.level]}${time} ${lvl}${RESET} [${entry.sys}] ${entry.msg}${dataStr}`
  }
  return `${time} ${lvl} [${entry.sys}] ${entry.msg}${dataStr}`
}

/* ------------------------------------------------------------------ */
/*  Logger factory                                                     */
/* ------------------------------------------------------------------ */

/**
 * Create a logger for a subsystem.
 *
 * @param subsystem  Short identifier ('tracker', 'store', 'sweeper', 'query', 'media', 'webhook')
 */
export function createLogger(subsystem: string): Logger {
  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      sys: subsystem,
      msg: message,
      ...(data && Object.keys(data).length > 0 ? { data } : {}),
    }

    // stderr only, stdout belongs to CLI output
    const consoleFn = level === 'warn' ? console.warn : console.error
    consoleFn(formatConsole(entry))

    writeToFile(entry)
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  }
}

/** Normalize a caught value for structured log data. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
