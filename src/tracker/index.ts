/**
 * MentionTracker — owns all tracker state and its lifecycle.
 *
 *   const tracker = new MentionTracker(loadConfig())
 *   await tracker.start()            // load records, sweep, schedule daily sweep
 *   await tracker.handle(roomId, message)
 *   tracker.whoMentioned(roomId, userId)
 *   await tracker.close()
 *
 * handle() and clearRoom() are queued per room, so one room's messages are
 * processed strictly in arrival order while rooms proceed independently.
 */

import { join } from 'node:path'
import type { ChatMessage, MentionRecord, TrackerConfig } from '../core/types.js'
import { KeyedMutex } from '../infra/keyed-mutex.js'
import { createLogger } from '../infra/logger.js'
import { HttpMediaResolver, type MediaResolver } from '../media/resolver.js'
import { QueryEngine } from '../query/query-engine.js'
import { type LoadReport, RecordStore } from '../store/record-store.js'
import { RetentionSweeper, type SweepReport } from '../store/sweeper.js'
import { RollingCache } from './rolling-cache.js'
import { type HandleResult, SessionTracker } from './session-tracker.js'

const log = createLogger('tracker')

export interface MentionTrackerDeps {
  media?: MediaResolver
  now?: () => number
}

export interface StartOptions {
  /** Schedule the daily sweep (default true) */
  schedule?: boolean
  /** Run the catch-up sweep before returning (default true); read-only callers turn it off */
  sweep?: boolean
}

export interface StartReport {
  load: LoadReport
  /** null when the catch-up sweep was skipped */
  sweep: SweepReport | null
}

export class MentionTracker {
  readonly store: RecordStore
  readonly cache: RollingCache
  readonly sessions: SessionTracker
  readonly query: QueryEngine
  readonly sweeper: RetentionSweeper

  private readonly roomQueue = new KeyedMutex()
  private readonly now: () => number
  private started = false

  constructor(
    readonly config: TrackerConfig,
    deps: MentionTrackerDeps = {},
  ) {
    this.now = deps.now ?? Date.now
    this.store = new RecordStore({ rootDir: join(config.dataDir, 'records') })
    this.cache = new RollingCache(config.cacheSize)

    const media =
      deps.media ??
      new HttpMediaResolver({
        mediaDir: (roomId) => this.store.mediaDir(roomId),
        timeoutMs: config.mediaTimeoutMs,
        enabled: config.enableMediaCache,
      })

    this.sessions = new SessionTracker({
      cache: this.cache,
      store: this.store,
      media,
      trackingCount: config.trackingCount,
      botId: config.botId,
      now: this.now,
    })
    this.query = new QueryEngine({ store: this.store, retentionDays: config.retentionDays })
    this.sweeper = new RetentionSweeper({
      store: this.store,
      retentionDays: config.retentionDays,
      sweepHour: config.sweepHour,
      sweepMinute: config.sweepMinute,
      isTracking: (roomId, recordId) => this.sessions.isTracking(roomId, recordId),
      runExclusive: <T>(roomId: string, task: () => Promise<T>) => this.roomQueue.run(roomId, task),
      now: this.now,
    })
  }

  async start(options: StartOptions = {}): Promise<StartReport> {
    if (this.started) throw new Error('MentionTracker already started')
    this.started = true

    const load = await this.store.loadAll()
    // Catch up on whatever expired while the process was down
    const sweep = (options.sweep ?? true) ? await this.sweeper.runScheduled() : null
    if (options.schedule ?? true) this.sweeper.start()

    log.info('Mention tracker started', {
      dataDir: this.config.dataDir,
      records: this.store.size,
      retentionDays: this.config.retentionDays,
      cacheSize: this.config.cacheSize,
      trackingCount: this.config.trackingCount,
    })
    return { load, sweep }
  }

  handle(roomId: string, message: ChatMessage): Promise<HandleResult> {
    return this.roomQueue.run(roomId, () => this.sessions.handle(roomId, message))
  }

  whoMentioned(roomId: string, subjectId: string): MentionRecord[] {
    return this.query.whoMentioned(roomId, subjectId, this.now())
  }

  /**
   * Manual clear: drops the room's open sessions first so nothing writes
   * into the emptied directory afterwards.
   */
  clearRoom(roomId: string): Promise<number> {
    return this.roomQueue.run(roomId, async () => {
      const dropped = this.sessions.dropRoom(roomId)
      const removed = await this.store.clear(roomId)
      log.info('Room records cleared', { roomId, removed, sessionsDropped: dropped })
      return removed
    })
  }

  sweep(): Promise<SweepReport> {
    return this.sweeper.runScheduled()
  }

  stats(): { records: number; rooms: number; queuedRooms: number } {
    return { records: this.store.size, rooms: this.store.rooms().length, queuedRooms: this.roomQueue.activeKeys }
  }

  /** Stop the schedule and wait for queued messages to finish. */
  async close(): Promise<void> {
    this.sweeper.stop()
    await this.roomQueue.drain()
    log.info('Mention tracker stopped')
  }
}
