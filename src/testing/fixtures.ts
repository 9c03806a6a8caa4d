/**
 * Builders and fakes shared by the test suites.
 */

import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ChatMessage, ContentItem, MediaRef, MentionRecord, TrackerConfig } from '../core/types.js'
import type { MediaResolver } from '../media/resolver.js'

export const BASE_TIME = Date.UTC(2026, 4, 10, 12, 0, 0)

export const text = (value: string): ContentItem => ({ type: 'text', text: value })
export const mention = (targetId: string, displayName = targetId): ContentItem => ({
  type: 'mention',
  targetId,
  displayName,
})
export const image = (url: string): ContentItem => ({ type: 'image', url })

export function msg(
  messageId: string,
  senderId: string,
  content: ContentItem[] = [text(`hello from ${senderId}`)],
  timestamp = BASE_TIME,
): ChatMessage {
  return { senderId, senderName: `${senderId}-name`, timestamp, content, messageId }
}

export function record(overrides: Partial<MentionRecord> & Pick<MentionRecord, 'id'>): MentionRecord {
  return {
    roomId: 'R',
    senderId: 'B',
    targets: [{ id: 'A', displayName: 'A' }],
    startTime: BASE_TIME,
    messages: [msg(`${overrides.id}-m`, overrides.senderId ?? 'B', [mention('A')])],
    associatedMedia: [],
    ...overrides,
  }
}

export function makeTempDir(prefix = 'mention-tracker-test-'): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix))
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) }
}

export function testConfig(dataDir: string, overrides: Partial<TrackerConfig> = {}): TrackerConfig {
  return {
    dataDir,
    retentionDays: 3,
    cacheSize: 5,
    trackingCount: 10,
    enableMediaCache: true,
    sweepHour: 4,
    sweepMinute: 0,
    mediaTimeoutMs: 1000,
    ...overrides,
  }
}

/**
 * Resolves every URL to `<last path segment>`. URLs in `failing` come back
 * unresolved, URLs in `throwing` reject. Records each call.
 */
export class FakeMediaResolver implements MediaResolver {
  readonly calls: Array<{ roomId: string; url: string }> = []
  readonly failing = new Set<string>()
  readonly throwing = new Set<string>()
  delayMs = 0

  async resolve(roomId: string, url: string): Promise<MediaRef> {
    this.calls.push({ roomId, url })
    if (this.delayMs > 0) await new Promise((r) => setTimeout(r, this.delayMs))
    if (this.throwing.has(url)) throw new Error(`resolver crashed on ${url}`)
    if (this.failing.has(url)) return { status: 'unresolved' }
    const filename = url.split('/').pop() ?? 'media.img'
    return { status: 'resolved', filename }
  }
}
