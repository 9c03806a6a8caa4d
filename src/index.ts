#!/usr/bin/env node
/**
 * Mention Tracker CLI
 *
 * Watches group chat messages for @mentions, keeps a short excerpt of the
 * conversation that follows, and answers "who mentioned me" queries.
 *
 * Usage:
 *   mention-tracker                       # Start server (default)
 *   mention-tracker sweep                 # Run one retention sweep
 *   mention-tracker query <room> <user>   # Print recent mentions of a user
 *   mention-tracker clear <room>          # Delete every record of a room
 */

import dotenv from 'dotenv'
dotenv.config({ path: ['.env.local', '.env'] })

import { loadConfig, loadServerConfig } from './core/config.js'
import { ConfigError } from './core/errors.js'
import { formatTimestamp } from './core/time.js'
import type { MentionRecord, TrackerConfig } from './core/types.js'
import type { MentionTracker } from './tracker/index.js'
import type { AdminClient } from './webhook/client.js'

const VERSION = '1.0.0'

interface CLIOptions {
  port?: number
  dataDir?: string
  help?: boolean
  version?: boolean
}

function parseArgs(args: string[]): { command: string; positional: string[]; options: CLIOptions } {
  const options: CLIOptions = {}
  const positional: string[] = []
  let command: string | undefined

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === '-h' || arg === '--help') {
      options.help = true
    } else if (arg === '-v' || arg === '--version') {
      options.version = true
    } else if (arg === '-p' || arg === '--port') {
      options.port = Number.parseInt(args[++i] ?? '', 10)
    } else if (arg === '--data-dir') {
      options.dataDir = args[++i]
    } else if (!arg.startsWith('-')) {
      if (command === undefined) command = arg
      else positional.push(arg)
    }
  }

  return { command: command ?? 'start', positional, options }
}

function printVersion() {
  console.log(`mention-tracker v${VERSION}`)
}

function printHelp() {
  console.log(`
Mention Tracker — who mentioned whom in group chats

Usage:
  mention-tracker [command] [options]

Commands:
  start                  Start the webhook server (default)
  sweep                  Delete records older than RETENTION_DAYS and exit
  query <room> <user>    Print the recent mentions of <user> in <room>
  clear <room>           Delete every record of <room>

  sweep and clear go through the running server when one answers on the port.

Options:
  -p, --port <port>      Server port (default: 3300)
  --data-dir <path>      Storage root (default: ./data/mention-tracker)
  -h, --help             Show this help message
  -v, --version          Show version

Environment Variables:
  DATA_DIR               Storage root
  RETENTION_DAYS         Record lifetime in days (default: 3)
  CACHE_SIZE             Recent messages kept per room (default: 5)
  TRACKING_COUNT         Messages captured after a mention (default: 10)
  ENABLE_MEDIA_CACHE     Download images of tracked messages (default: true)
  SWEEP_HOUR             Daily sweep hour, local time (default: 4)
  SWEEP_MINUTE           Daily sweep minute (default: 0)
  MEDIA_TIMEOUT_MS       Image download timeout (default: 20000)
  BOT_ID                 The bot's own sender id
  WEBHOOK_PORT           Server port (default: 3300)
  WEBHOOK_SECRET         Secret for admin endpoints (default: dev-secret)
  LOG_LEVEL              debug | info | warn | error (default: info)
`)
}

function trackerConfig(options: CLIOptions): TrackerConfig {
  return loadConfig(process.env, options.dataDir ? { dataDir: options.dataDir } : {})
}

// Loaded lazily so LOG_LEVEL from .env files is in place before the logger initializes
async function createTracker(options: CLIOptions): Promise<MentionTracker> {
  const { MentionTracker } = await import('./tracker/index.js')
  return new MentionTracker(trackerConfig(options))
}

async function startServer(options: CLIOptions) {
  const serverConfig = loadServerConfig(process.env, options.port)
  const { WebhookServer } = await import('./webhook/server.js')

  const tracker = await createTracker(options)
  const { config } = tracker
  await tracker.start()

  const server = new WebhookServer(tracker, serverConfig)
  const port = await server.start()

  console.log(`📁 Data:      ${config.dataDir}`)
  console.log(`🗓️  Retention: ${config.retentionDays} days`)
  console.log(`💬 Tracking:  ${config.trackingCount} messages after each mention`)
  console.log(`🌐 Port:      ${port}`)

  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down...`)
    await server.stop()
    await tracker.close()
    process.exit(0)
  }
  process.once('SIGINT', () => void shutdown('SIGINT'))
  process.once('SIGTERM', () => void shutdown('SIGTERM'))
}

// Offline access to the data directory; loads records without the catch-up sweep
async function withTracker<T>(options: CLIOptions, fn: (tracker: MentionTracker) => Promise<T>): Promise<T> {
  const tracker = await createTracker(options)
  await tracker.start({ schedule: false, sweep: false })
  try {
    return await fn(tracker)
  } finally {
    await tracker.close()
  }
}

function printRecord(record: MentionRecord) {
  const start = record.startTime === null ? 'unknown time' : formatTimestamp(record.startTime)
  const targets = record.targets.map((t) => `@${t.displayName}`).join(' ')
  console.log(`\n[${start}] ${record.senderId} → ${targets}`)
  for (const message of record.messages) {
    const parts = message.content.map((item) => {
      switch (item.type) {
        case 'text':
          return item.text
        case 'image':
          return '[image]'
        case 'mention':
          return `@${item.displayName}`
      }
    })
    console.log(`  ${message.senderName}: ${parts.join(' ')}`)
  }
}

/** Client for a server already running on the configured port, if there is one. */
async function runningServer(options: CLIOptions): Promise<AdminClient | null> {
  const { port, secret } = loadServerConfig(process.env, options.port)
  const { AdminClient } = await import('./webhook/client.js')
  const client = new AdminClient({ baseUrl: `http://127.0.0.1:${port}`, secret })
  return (await client.isRunning()) ? client : null
}

async function main() {
  const { command, positional, options } = parseArgs(process.argv.slice(2))

  if (options.version) {
    printVersion()
    process.exit(0)
  }

  if (options.help) {
    printHelp()
    process.exit(0)
  }

  switch (command) {
    case 'start':
    case 'server':
      await startServer(options)
      break

    case 'sweep': {
      const server = await runningServer(options)
      const sweep = server ? await server.sweep() : await withTracker(options, (tracker) => tracker.sweep())
      console.log(
        `✅ Sweep complete: ${sweep.deleted} deleted, ${sweep.kept} kept, ${sweep.removedDirs.length} empty rooms removed`,
      )
      break
    }

    case 'query': {
      const [roomId, userId] = positional
      if (!roomId || !userId) {
        console.error('Usage: mention-tracker query <room> <user>')
        process.exit(1)
      }
      const records = await withTracker(options, async (tracker) => tracker.whoMentioned(roomId, userId))
      if (records.length === 0) {
        console.log('No recent mentions')
      } else {
        records.forEach(printRecord)
      }
      break
    }

    case 'clear': {
      const [roomId] = positional
      if (!roomId) {
        console.error('Usage: mention-tracker clear <room>')
        process.exit(1)
      }
      const server = await runningServer(options)
      const removed = server
        ? await server.clearRoom(roomId)
        : await withTracker(options, (tracker) => tracker.clearRoom(roomId))
      console.log(`✅ Removed ${removed} records from room ${roomId}`)
      break
    }

    case 'help':
      printHelp()
      break

    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      process.exit(1)
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`)
  } else {
    console.error('❌ Error:', error instanceof Error ? error.message : String(error))
  }
  process.exit(1)
})
