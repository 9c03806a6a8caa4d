/**
 * "Who mentioned me" queries over stored records.
 *
 * A record qualifies when it belongs to the room, started within the
 * retention horizon and targets the subject (or everyone). Its excerpt is
 * then cut after the sender's last follow-up plus one more message. Records
 * whose own triggering mention can't be found are left out.
 */

import { DAY_MS } from '../core/time.js'
import type { MentionRecord } from '../core/types.js'
import { EVERYONE, hasMention } from '../core/types.js'
import { createLogger } from '../infra/logger.js'
import type { RecordStore } from '../store/record-store.js'

const log = createLogger('query')

export const MAX_RESULTS = 10

export interface QueryEngineOptions {
  store: RecordStore
  retentionDays: number
}

/**
 * The excerpt a query shows for a record, or null when the record has no
 * message by its sender that contains a mention. The result shares no
 * arrays with the stored record.
 */
export function finalizeRecord(record: MentionRecord): MentionRecord | null {
  const { messages, senderId } = record

  const mentionIndex = messages.findIndex((m) => m.senderId === senderId && hasMention(m))
  if (mentionIndex === -1) return null

  let lastFollowUp = -1
  for (let i = mentionIndex + 1; i < messages.length; i++) {
    if (messages[i].senderId === senderId) lastFollowUp = i
  }

  const end = lastFollowUp === -1 ? messages.length : Math.min(lastFollowUp + 2, messages.length)
  return {
    ...record,
    targets: record.targets.map((t) => ({ ...t })),
    messages: messages.slice(0, end).map((m) => ({ ...m, content: m.content.map((item) => ({ ...item })) })),
    associatedMedia: [...record.associatedMedia],
  }
}

export class QueryEngine {
  private readonly store: RecordStore
  private readonly horizonMs: number

  constructor(options: QueryEngineOptions) {
    this.store = options.store
    this.horizonMs = options.retentionDays * DAY_MS
  }

  whoMentioned(roomId: string, subjectId: string, now: number = Date.now()): MentionRecord[] {
    const cutoff = now - this.horizonMs
    const finalized: Array<MentionRecord & { startTime: number }> = []

    for (const record of this.store.list(roomId)) {
      const { startTime } = record
      if (startTime === null) {
        log.warn('Record has an unreadable start time, skipped', { roomId, recordId: record.id })
        continue
      }
      if (startTime < cutoff) continue
      if (!record.targets.some((t) => t.id === subjectId || t.id === EVERYONE)) continue

      const result = finalizeRecord(record)
      if (result) finalized.push({ ...result, startTime })
    }

    finalized.sort((a, b) => b.startTime - a.startTime)
    const recent = finalized.slice(0, MAX_RESULTS)
    log.debug('Query answered', { roomId, subjectId, matches: finalized.length, returned: recent.length })
    return recent
  }
}
