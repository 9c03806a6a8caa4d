/**
 * Normalized inbound message events.
 *
 * Platform adapters (or the webhook) hand over events in this shape; the
 * tracker never sees a platform's own wire format.
 */

import * as z from 'zod'
import { parseTimestamp } from './time.js'
import type { ChatMessage, ContentItem } from './types.js'
import { EVERYONE } from './types.js'

export const MAX_TEXT_LENGTH = 200

export const IncomingContentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), url: z.string().url() }),
  z.object({
    type: z.literal('mention'),
    targetId: z.string().min(1),
    displayName: z.string().optional(),
  }),
])

export const IncomingMessageSchema = z.object({
  senderId: z.string().min(1),
  senderName: z.string().optional(),
  /** ISO 8601; defaults to the time of arrival */
  timestamp: z
    .string()
    .refine((value) => parseTimestamp(value) !== null, { message: 'invalid timestamp' })
    .optional(),
  messageId: z.string().min(1),
  content: z.array(IncomingContentSchema),
})

export type IncomingMessage = z.infer<typeof IncomingMessageSchema>

function normalizeContent(item: IncomingMessage['content'][number]): ContentItem | null {
  switch (item.type) {
    case 'text': {
      const text = item.text.trim()
      return text ? { type: 'text', text: text.slice(0, MAX_TEXT_LENGTH) } : null
    }
    case 'image':
      return { type: 'image', url: item.url }
    case 'mention':
      return {
        type: 'mention',
        targetId: item.targetId,
        displayName: item.displayName ?? (item.targetId === EVERYONE ? 'everyone' : item.targetId),
      }
  }
}

export function toChatMessage(input: IncomingMessage, receivedAt: number = Date.now()): ChatMessage {
  const sentAt = input.timestamp ? parseTimestamp(input.timestamp) : null
  return {
    senderId: input.senderId,
    senderName: input.senderName || input.senderId,
    timestamp: sentAt ?? receivedAt,
    content: input.content.map(normalizeContent).filter((item): item is ContentItem => item !== null),
    messageId: input.messageId,
  }
}
