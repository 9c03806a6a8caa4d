/**
 * On-disk record format.
 *
 * One JSON document per record with the stable field names
 * id, roomId, senderId, targets, startTime, messages, associatedMedia.
 */

import * as z from 'zod'
import { RecordFormatError } from '../core/errors.js'
import { formatTimestamp, parseTimestamp } from '../core/time.js'
import type { ChatMessage, ContentItem, MentionRecord } from '../core/types.js'

const MediaRefSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('resolved'), filename: z.string().min(1) }),
  z.object({ status: z.literal('unresolved') }),
])

export const ContentItemSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), url: z.string(), media: MediaRefSchema.optional() }),
  z.object({ type: z.literal('mention'), targetId: z.string().min(1), displayName: z.string() }),
])

const StoredMessageSchema = z.object({
  senderId: z.string().min(1),
  senderName: z.string(),
  timestamp: z.string(),
  messageId: z.string(),
  content: z.array(ContentItemSchema),
})

export const StoredRecordSchema = z.object({
  id: z.string().min(1),
  roomId: z.string().min(1),
  senderId: z.string().min(1),
  targets: z.array(z.object({ id: z.string().min(1), displayName: z.string() })),
  // Kept loose: a bad start time must not make the whole record unreadable
  startTime: z.unknown().optional(),
  messages: z.array(StoredMessageSchema),
  associatedMedia: z.array(z.string()).default([]),
})

export type StoredRecord = z.infer<typeof StoredRecordSchema>

type StoredMessage = z.infer<typeof StoredMessageSchema>

function serializeMessage(message: ChatMessage): StoredMessage {
  return {
    senderId: message.senderId,
    senderName: message.senderName,
    timestamp: formatTimestamp(message.timestamp),
    messageId: message.messageId,
    content: message.content.map((item) => ({ ...item })),
  }
}

export function serializeRecord(record: MentionRecord): StoredRecord {
  return {
    id: record.id,
    roomId: record.roomId,
    senderId: record.senderId,
    targets: record.targets.map((t) => ({ ...t })),
    startTime: record.startTime === null ? null : formatTimestamp(record.startTime),
    messages: record.messages.map(serializeMessage),
    associatedMedia: [...record.associatedMedia],
  }
}

/**
 * Validate and convert a parsed JSON document into a record.
 * The start time may come back null; callers decide what that means.
 */
export function deserializeRecord(raw: unknown): MentionRecord {
  const result = StoredRecordSchema.safeParse(raw)
  if (!result.success) {
    throw new RecordFormatError('Record does not match the stored format', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    })
  }
  const stored = result.data

  const messages = stored.messages.map((m, index): ChatMessage => {
    const timestamp = parseTimestamp(m.timestamp)
    if (timestamp === null) {
      throw new RecordFormatError(`Message ${index} has an invalid timestamp`, {
        timestamp: m.timestamp,
      })
    }
    const content: ContentItem[] = m.content
    return { senderId: m.senderId, senderName: m.senderName, timestamp, messageId: m.messageId, content }
  })

  return {
    id: stored.id,
    roomId: stored.roomId,
    senderId: stored.senderId,
    targets: stored.targets,
    startTime: parseTimestamp(stored.startTime),
    messages,
    associatedMedia: [...new Set(stored.associatedMedia)],
  }
}
