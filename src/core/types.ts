/**
 * Domain types shared by the tracker, the record store and the query engine.
 *
 * Timestamps are epoch milliseconds in memory. They are only turned into
 * text at the storage and HTTP boundaries.
 */

/** Target id meaning "everyone in the room". */
export const EVERYONE = 'all'

/* ------------------------------------------------------------------ */
/*  Messages                                                           */
/* ------------------------------------------------------------------ */

export type MediaRef = { status: 'resolved'; filename: string } | { status: 'unresolved' }

export interface TextItem {
  type: 'text'
  text: string
}

export interface ImageItem {
  type: 'image'
  url: string
  /** Set once the media resolver has run for this item */
  media?: MediaRef
}

export interface MentionItem {
  type: 'mention'
  targetId: string
  displayName: string
}

export type ContentItem = TextItem | ImageItem | MentionItem

export interface ChatMessage {
  senderId: string
  senderName: string
  timestamp: number
  content: ContentItem[]
  /** Platform message identifier */
  messageId: string
}

/* ------------------------------------------------------------------ */
/*  Records & sessions                                                 */
/* ------------------------------------------------------------------ */

export interface MentionTarget {
  id: string
  displayName: string
}

export interface MentionRecord {
  id: string
  roomId: string
  senderId: string
  targets: MentionTarget[]
  /** null when a stored record carries an unreadable start time */
  startTime: number | null
  messages: ChatMessage[]
  /** Media filenames owned by this record (set semantics) */
  associatedMedia: string[]
}

export interface TrackingSession {
  recordId: string
  senderId: string
  /** Sorted, de-duplicated target ids joined with ',' */
  targetKey: string
  remaining: number
}

export interface TrackerConfig {
  dataDir: string
  retentionDays: number
  cacheSize: number
  trackingCount: number
  enableMediaCache: boolean
  sweepHour: number
  sweepMinute: number
  mediaTimeoutMs: number
  botId?: string
}

export function isMention(item: ContentItem): item is MentionItem {
  return item.type === 'mention'
}

export function hasMention(message: ChatMessage): boolean {
  return message.content.some(isMention)
}

/** Canonical key for a target set: order and duplicates don't matter. */
export function targetKey(targets: readonly MentionTarget[]): string {
  return [...new Set(targets.map((t) => t.id))].sort().join(',')
}
