/**
 * Session Tracker — correlates incoming room messages with open mention
 * sessions.
 *
 * Per message, in order:
 *   1. the message enters the rolling cache
 *   2. advance: every open session of the room appends the message to its
 *      record, persists it and spends one unit of budget
 *   3. trigger: a message mentioning someone other than its sender opens a
 *      session, unless one is already open for the same sender and targets
 *   4. a new session starts from a record built out of the cached context,
 *      written to the store before the session opens
 *
 * Records are written on creation and after every append, so a crash never
 * loses more than the message in flight.
 *
 * Callers must not run handle() concurrently for the same room; the
 * MentionTracker service serializes calls per room.
 */

import { createHash } from 'node:crypto'
import { compactStamp } from '../core/time.js'
import type { ChatMessage, MentionRecord, MentionTarget, TrackingSession } from '../core/types.js'
import { isMention, targetKey } from '../core/types.js'
import { createLogger, errorMessage } from '../infra/logger.js'
import { type MediaResolver, type ResolvedMessage, resolveMessageMedia } from '../media/resolver.js'
import type { RecordStore } from '../store/record-store.js'
import type { RollingCache } from './rolling-cache.js'

const log = createLogger('tracker')

export interface SessionTrackerOptions {
  cache: RollingCache
  store: RecordStore
  media: MediaResolver
  trackingCount: number
  /** Sender id of the bot itself; its messages never open sessions */
  botId?: string
  now?: () => number
}

export interface HandleResult {
  /** Records the message was appended to */
  appended: string[]
  /** Records whose session closed on this message */
  closed: string[]
  /** Sessions dropped because their record no longer exists */
  dangling: string[]
  /** Record opened by this message, if any */
  opened?: string
}

export function buildRecordId(roomId: string, now: number, messageId: string): string {
  const digest = createHash('md5').update(messageId).digest('hex').slice(0, 8)
  return `${roomId}_${compactStamp(now)}_${digest}`
}

/** Mention targets of a message, excluding its own sender, first occurrence wins. */
export function mentionTargets(message: ChatMessage): MentionTarget[] {
  const seen = new Map<string, MentionTarget>()
  for (const item of message.content) {
    if (!isMention(item) || item.targetId === message.senderId || seen.has(item.targetId)) continue
    seen.set(item.targetId, { id: item.targetId, displayName: item.displayName })
  }
  return Array.from(seen.values())
}

/**
 * Index where the initial excerpt starts: one message before the sender's
 * most recent earlier message, or the start of the cache when the sender
 * has none. The last element of `context` is the triggering message.
 */
export function contextStart(context: readonly ChatMessage[], senderId: string): number {
  for (let i = context.length - 2; i >= 0; i--) {
    if (context[i].senderId === senderId) return Math.max(0, i - 1)
  }
  return 0
}

export class SessionTracker {
  private sessions = new Map<string, TrackingSession[]>()
  private readonly cache: RollingCache
  private readonly store: RecordStore
  private readonly media: MediaResolver
  private readonly now: () => number
  private readonly trackingCount: number
  private readonly botId?: string

  constructor(options: SessionTrackerOptions) {
    this.cache = options.cache
    this.store = options.store
    this.media = options.media
    this.trackingCount = Math.max(1, Math.floor(options.trackingCount))
    this.botId = options.botId
    this.now = options.now ?? Date.now
  }

  openSessions(roomId: string): readonly Readonly<TrackingSession>[] {
    return this.sessions.get(roomId) ?? []
  }

  /** Whether any open session still writes to this record. */
  isTracking(roomId: string, recordId: string): boolean {
    return this.openSessions(roomId).some((s) => s.recordId === recordId)
  }

  /** Discard all open sessions of a room. Returns how many were dropped. */
  dropRoom(roomId: string): number {
    const count = this.sessions.get(roomId)?.length ?? 0
    this.sessions.delete(roomId)
    return count
  }

  async handle(roomId: string, message: ChatMessage): Promise<HandleResult> {
    this.cache.observe(roomId, message)
    const context = Array.from(this.cache.snapshot(roomId))

    const result = await this.advance(roomId, message)

    const targets = mentionTargets(message)
    if (targets.length === 0 || message.senderId === this.botId) return result

    const key = targetKey(targets)
    const alreadyOpen = this.openSessions(roomId).some(
      (s) => s.senderId === message.senderId && s.targetKey === key,
    )
    if (alreadyOpen) {
      log.debug('Mention continues an open session', { roomId, senderId: message.senderId, targets: key })
      return result
    }

    result.opened = await this.open(roomId, message, targets, context)
    return result
  }

  /* ---------------------------------------------------------------- */
  /*  Advance phase                                                    */
  /* ---------------------------------------------------------------- */

  private async advance(roomId: string, message: ChatMessage): Promise<HandleResult> {
    const result: HandleResult = { appended: [], closed: [], dangling: [] }
    const current = this.sessions.get(roomId)
    if (!current || current.length === 0) return result

    // One resolution per message, shared by every record it is appended to
    let resolved: Promise<ResolvedMessage> | undefined
    const live: TrackingSession[] = []

    for (const session of current) {
      const record = this.store.get(roomId, session.recordId)
      if (!record) {
        log.warn('Open session has no record, dropping it', {
          anomaly: 'dangling-session',
          roomId,
          recordId: session.recordId,
        })
        result.dangling.push(session.recordId)
        continue
      }

      resolved ??= resolveMessageMedia(this.media, roomId, message)
      const { message: stored, media } = await resolved
      record.messages.push(stored)
      addMedia(record, media)
      await this.persist(record)
      result.appended.push(record.id)

      session.remaining -= 1
      if (session.remaining > 0) {
        live.push(session)
      } else {
        result.closed.push(record.id)
        log.info('Tracking session finished', { roomId, recordId: record.id })
      }
    }

    if (live.length > 0) {
      this.sessions.set(roomId, live)
    } else {
      this.sessions.delete(roomId)
    }
    return result
  }

  /* ---------------------------------------------------------------- */
  /*  New sessions                                                     */
  /* ---------------------------------------------------------------- */

  private async open(
    roomId: string,
    message: ChatMessage,
    targets: MentionTarget[],
    context: ChatMessage[],
  ): Promise<string> {
    const now = this.now()
    const excerpt = context.slice(contextStart(context, message.senderId))

    let id = buildRecordId(roomId, now, message.messageId)
    for (let n = 1; this.store.get(roomId, id); n++) {
      id = `${buildRecordId(roomId, now, message.messageId)}_${n}`
    }

    const resolved = await Promise.all(excerpt.map((m) => resolveMessageMedia(this.media, roomId, m)))
    const record: MentionRecord = {
      id,
      roomId,
      senderId: message.senderId,
      targets,
      startTime: now,
      messages: resolved.map((r) => r.message),
      associatedMedia: [],
    }
    addMedia(
      record,
      resolved.flatMap((r) => r.media),
    )

    await this.persist(record)
    log.info('Mention detected, record created', { roomId, recordId: id, targets: targetKey(targets) })

    const session: TrackingSession = {
      recordId: id,
      senderId: message.senderId,
      targetKey: targetKey(targets),
      remaining: this.trackingCount,
    }
    const sessions = this.sessions.get(roomId) ?? []
    sessions.push(session)
    this.sessions.set(roomId, sessions)
    log.info(`Tracking next ${this.trackingCount} messages`, { roomId, recordId: id })
    return id
  }

  /** Write-through; a failed write is logged and retried by the next append. */
  private async persist(record: MentionRecord): Promise<void> {
    try {
      await this.store.put(record)
    } catch (error) {
      log.error('Failed to save record', { roomId: record.roomId, recordId: record.id, error: errorMessage(error) })
    }
  }
}

function addMedia(record: MentionRecord, filenames: string[]): void {
  for (const filename of filenames) {
    if (!record.associatedMedia.includes(filename)) record.associatedMedia.push(filename)
  }
}
