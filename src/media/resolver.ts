/**
 * Media resolution: turns image URLs found in messages into files under the
 * room's media directory.
 *
 * Failures never propagate. A fetch that errors, times out or returns a
 * non-2xx status resolves to the `unresolved` placeholder, and the record
 * keeps the source URL.
 */

import { createHash } from 'node:crypto'
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ChatMessage, ContentItem, MediaRef } from '../core/types.js'
import { createLogger, errorMessage } from '../infra/logger.js'

const log = createLogger('media')

export interface MediaResolver {
  resolve(roomId: string, url: string): Promise<MediaRef>
}

export interface HttpMediaResolverOptions {
  /** Directory that receives a room's media files */
  mediaDir: (roomId: string) => string
  timeoutMs: number
  /** When false nothing is downloaded and every image stays unresolved */
  enabled: boolean
  fetch?: typeof fetch
}

const EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/bmp': 'bmp',
}

export function mediaFilename(data: Uint8Array, contentType: string | null): string {
  const hash = createHash('sha256').update(data).digest('hex').slice(0, 32)
  const mime = contentType?.split(';')[0]?.trim().toLowerCase() ?? ''
  return `${hash}.${EXTENSIONS[mime] ?? 'img'}`
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

export class HttpMediaResolver implements MediaResolver {
  private inFlight = new Map<string, Promise<MediaRef>>()
  private readonly fetchFn: typeof fetch

  constructor(private options: HttpMediaResolverOptions) {
    this.fetchFn = options.fetch ?? fetch
  }

  resolve(roomId: string, url: string): Promise<MediaRef> {
    if (!this.options.enabled) return Promise.resolve({ status: 'unresolved' })

    const key = `${roomId}\n${url}`
    const existing = this.inFlight.get(key)
    if (existing) return existing

    const pending = this.download(roomId, url).finally(() => this.inFlight.delete(key))
    this.inFlight.set(key, pending)
    return pending
  }

  private async download(roomId: string, url: string): Promise<MediaRef> {
    try {
      const response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
        redirect: 'follow',
      })
      if (!response.ok) {
        log.warn('Media fetch failed', { roomId, url, status: response.status })
        return { status: 'unresolved' }
      }

      const data = new Uint8Array(await response.arrayBuffer())
      const filename = mediaFilename(data, response.headers.get('content-type'))
      const dir = this.options.mediaDir(roomId)
      await mkdir(dir, { recursive: true })
      try {
        await writeFile(join(dir, filename), data, { flag: 'wx' })
      } catch (error) {
        // Same content already stored under this name
        if (!isErrnoCode(error, 'EEXIST')) throw error
      }

      log.debug('Media stored', { roomId, url, filename })
      return { status: 'resolved', filename }
    } catch (error) {
      log.warn('Media resolution failed, using placeholder', { roomId, url, error: errorMessage(error) })
      return { status: 'unresolved' }
    }
  }
}

export interface ResolvedMessage {
  message: ChatMessage
  /** Filenames of media stored for this message */
  media: string[]
}

/**
 * Resolve every image of a message in parallel. Returns a new message;
 * the input is left untouched since the rolling cache may still hold it.
 * Images resolved earlier keep their reference. A resolver that throws
 * yields the unresolved placeholder for that image.
 */
export async function resolveMessageMedia(
  resolver: MediaResolver,
  roomId: string,
  message: ChatMessage,
): Promise<ResolvedMessage> {
  const content = await Promise.all(
    message.content.map(async (item): Promise<ContentItem> => {
      if (item.type !== 'image' || item.media?.status === 'resolved') return item
      try {
        return { ...item, media: await resolver.resolve(roomId, item.url) }
      } catch (error) {
        log.warn('Media resolver failed, using placeholder', { roomId, url: item.url, error: errorMessage(error) })
        return { ...item, media: { status: 'unresolved' } }
      }
    }),
  )

  const media = content.flatMap((item) =>
    item.type === 'image' && item.media?.status === 'resolved' ? [item.media.filename] : [],
  )
  return { message: { ...message, content }, media }
}
