/**
 * Tracker configuration from environment variables.
 *
 * Invalid values are not silently replaced by defaults: loadConfig throws a
 * ConfigError listing every offending variable.
 */

import { resolve } from 'node:path'
import * as z from 'zod'
import { ConfigError } from './errors.js'
import type { TrackerConfig } from './types.js'

export interface ServerConfig {
  port: number
  secret: string
}

const boolFromEnv = z
  .string()
  .transform((raw) => raw.trim().toLowerCase())
  .refine((raw) => ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'].includes(raw), {
    message: 'expected true/false',
  })
  .transform((raw) => ['1', 'true', 'yes', 'on'].includes(raw))

function intFromEnv(min: number, max: number) {
  return z.coerce.number().int().min(min).max(max)
}

const EnvSchema = z.object({
  DATA_DIR: z.string().min(1).default('./data/mention-tracker'),
  RETENTION_DAYS: intFromEnv(1, 3650).default(3),
  CACHE_SIZE: intFromEnv(1, 1000).default(5),
  TRACKING_COUNT: intFromEnv(1, 1000).default(10),
  ENABLE_MEDIA_CACHE: boolFromEnv.default('true'),
  SWEEP_HOUR: intFromEnv(0, 23).default(4),
  SWEEP_MINUTE: intFromEnv(0, 59).default(0),
  MEDIA_TIMEOUT_MS: intFromEnv(100, 300_000).default(20_000),
  BOT_ID: z.string().optional(),
  WEBHOOK_PORT: intFromEnv(0, 65535).default(3300),
  WEBHOOK_SECRET: z.string().min(1).default('dev-secret'),
})

type Env = Record<string, string | undefined>

function parseEnv(env: Env): z.infer<typeof EnvSchema> {
  // Empty strings (e.g. `BOT_ID=` in .env) mean "unset"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  )
  const result = EnvSchema.safeParse(cleaned)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues })
  }
  return result.data
}

export function loadConfig(env: Env = process.env, overrides: Partial<TrackerConfig> = {}): TrackerConfig {
  const parsed = parseEnv(env)
  return {
    dataDir: resolve(overrides.dataDir ?? parsed.DATA_DIR),
    retentionDays: overrides.retentionDays ?? parsed.RETENTION_DAYS,
    cacheSize: overrides.cacheSize ?? parsed.CACHE_SIZE,
    trackingCount: overrides.trackingCount ?? parsed.TRACKING_COUNT,
    enableMediaCache: overrides.enableMediaCache ?? parsed.ENABLE_MEDIA_CACHE,
    sweepHour: overrides.sweepHour ?? parsed.SWEEP_HOUR,
    sweepMinute: overrides.sweepMinute ?? parsed.SWEEP_MINUTE,
    mediaTimeoutMs: overrides.mediaTimeoutMs ?? parsed.MEDIA_TIMEOUT_MS,
    botId: overrides.botId ?? parsed.BOT_ID,
  }
}

export function loadServerConfig(env: Env = process.env, port?: number): ServerConfig {
  const parsed = parseEnv(env)
  if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
    throw new ConfigError(`Invalid port: ${port}`)
  }
  return { port: port ?? parsed.WEBHOOK_PORT, secret: parsed.WEBHOOK_SECRET }
}
