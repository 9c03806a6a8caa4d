/**
 * Per-room FIFO buffer of the most recent messages.
 *
 * Used to reconstruct the context leading up to a mention. Capacity is
 * fixed when a room's buffer is created; later capacity changes only apply
 * to rooms seen afterwards.
 */

import type { ChatMessage } from '../core/types.js'

interface RoomBuffer {
  capacity: number
  items: ChatMessage[]
}

export class RollingCache {
  private buffers = new Map<string, RoomBuffer>()
  private capacity: number

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity))
  }

  setCapacity(capacity: number): void {
    this.capacity = Math.max(1, Math.floor(capacity))
  }

  observe(roomId: string, message: ChatMessage): void {
    let buffer = this.buffers.get(roomId)
    if (!buffer) {
      buffer = { capacity: this.capacity, items: [] }
      this.buffers.set(roomId, buffer)
    }

    buffer.items.push(message)
    if (buffer.items.length > buffer.capacity) {
      buffer.items.splice(0, buffer.items.length - buffer.capacity)
    }
  }

  /**
   * Current contents, oldest first. The generator walks a copy taken at
   * call time, so later observe() calls don't affect it.
   */
  snapshot(roomId: string): Generator<ChatMessage, void, undefined> {
    const items = this.buffers.get(roomId)?.items.slice() ?? []
    return (function* () {
      yield* items
    })()
  }

  size(roomId: string): number {
    return this.buffers.get(roomId)?.items.length ?? 0
  }

  clear(roomId: string): void {
    this.buffers.delete(roomId)
  }
}
