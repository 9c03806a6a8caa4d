/**
 * File-backed mention record store.
 *
 * Layout under the root directory:
 *   <roomId>/record_<id>.json   one record per file
 *   <roomId>/media/<file>       media owned by the room's records
 *
 * The in-memory index is the working copy; every put() writes through to
 * disk before resolving. Writes go to a temp file that is renamed over the
 * target, so readers see either the old or the new document. All file
 * operations for a room are serialized by a per-room lock.
 */

import { randomBytes } from 'node:crypto'
import { mkdir, readFile, readdir, rename, rm, rmdir, unlink, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import type { MentionRecord } from '../core/types.js'
import { KeyedMutex } from '../infra/keyed-mutex.js'
import { createLogger, errorMessage } from '../infra/logger.js'
import { deserializeRecord, serializeRecord } from './schema.js'

const log = createLogger('store')

const ROOM_DIR_PATTERN = /^[A-Za-z0-9_.-]+$/
const RECORD_FILE_PATTERN = /^record_(.+)\.json$/
export const MEDIA_DIR = 'media'

export interface RecordStoreOptions {
  /** Directory holding one subdirectory per room */
  rootDir: string
}

export interface LoadReport {
  loaded: number
  skipped: number
}

/** Runs a task with a room held exclusively by the caller's own queue. */
export type RoomExclusive = <T>(roomId: string, task: () => Promise<T>) => Promise<T>

export function isValidRoomId(roomId: string): boolean {
  return ROOM_DIR_PATTERN.test(roomId) && roomId !== '.' && roomId !== '..'
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

export class RecordStore {
  readonly rootDir: string
  private records = new Map<string, Map<string, MentionRecord>>()
  private locks = new KeyedMutex()

  constructor(options: RecordStoreOptions) {
    this.rootDir = options.rootDir
  }

  /* ---------------------------------------------------------------- */
  /*  Paths                                                            */
  /* ---------------------------------------------------------------- */

  roomDir(roomId: string): string {
    if (!isValidRoomId(roomId)) {
      throw new Error(`Invalid room id: ${JSON.stringify(roomId)}`)
    }
    return join(this.rootDir, roomId)
  }

  mediaDir(roomId: string): string {
    return join(this.roomDir(roomId), MEDIA_DIR)
  }

  private recordPath(roomId: string, recordId: string): string {
    return join(this.roomDir(roomId), `record_${recordId}.json`)
  }

  /* ---------------------------------------------------------------- */
  /*  Loading                                                          */
  /* ---------------------------------------------------------------- */

  /**
   * Rebuild the index from disk. Files that fail to parse or validate are
   * skipped with a warning.
   */
  async loadAll(): Promise<LoadReport> {
    this.records.clear()
    const report: LoadReport = { loaded: 0, skipped: 0 }

    let roomDirs: string[]
    try {
      await mkdir(this.rootDir, { recursive: true })
      const entries = await readdir(this.rootDir, { withFileTypes: true })
      roomDirs = entries.filter((e) => e.isDirectory() && isValidRoomId(e.name)).map((e) => e.name)
    } catch (error) {
      log.error('Cannot read record directory', { rootDir: this.rootDir, error: errorMessage(error) })
      return report
    }

    for (const roomId of roomDirs) {
      let files: string[]
      try {
        files = await readdir(this.roomDir(roomId))
      } catch (error) {
        log.error('Cannot read room directory', { roomId, error: errorMessage(error) })
        continue
      }

      for (const file of files) {
        const match = RECORD_FILE_PATTERN.exec(file)
        if (!match) continue

        try {
          const raw: unknown = JSON.parse(await readFile(join(this.roomDir(roomId), file), 'utf-8'))
          const record = deserializeRecord(raw)
          if (record.roomId !== roomId || record.id !== match[1]) {
            throw new Error(`record ${record.roomId}/${record.id} stored under ${roomId}/${file}`)
          }
          if (record.startTime === null) {
            log.warn('Record has no readable start time', { roomId, recordId: record.id })
          }
          this.index(record)
          report.loaded++
        } catch (error) {
          report.skipped++
          log.warn('Skipping unreadable record file', { roomId, file, error: errorMessage(error) })
        }
      }
    }

    log.info(`Loaded ${report.loaded} records`, { rooms: this.records.size, skipped: report.skipped })
    return report
  }

  /* ---------------------------------------------------------------- */
  /*  Reads                                                            */
  /* ---------------------------------------------------------------- */

  get(roomId: string, recordId: string): MentionRecord | undefined {
    return this.records.get(roomId)?.get(recordId)
  }

  list(roomId: string): MentionRecord[] {
    return Array.from(this.records.get(roomId)?.values() ?? [])
  }

  rooms(): string[] {
    return Array.from(this.records.keys())
  }

  get size(): number {
    let total = 0
    for (const room of this.records.values()) total += room.size
    return total
  }

  /* ---------------------------------------------------------------- */
  /*  Writes                                                           */
  /* ---------------------------------------------------------------- */

  /** Index the record and write it through to disk. */
  put(record: MentionRecord): Promise<void> {
    return this.locks.run(record.roomId, async () => {
      this.index(record)

      const dir = this.roomDir(record.roomId)
      const target = this.recordPath(record.roomId, record.id)
      const temp = join(dir, `.record_${record.id}.${randomBytes(4).toString('hex')}.tmp`)

      await mkdir(dir, { recursive: true })
      try {
        await writeFile(temp, JSON.stringify(serializeRecord(record), null, 2), 'utf-8')
        await rename(temp, target)
      } catch (error) {
        await rm(temp, { force: true })
        throw error
      }
      log.debug('Record saved', { roomId: record.roomId, recordId: record.id })
    })
  }

  /**
   * Remove a record and its media. Media still referenced by another record
   * of the room are left in place. Failures on individual files are logged.
   */
  delete(roomId: string, recordId: string): Promise<boolean> {
    return this.locks.run(roomId, async () => {
      const room = this.records.get(roomId)
      const record = room?.get(recordId)
      if (!room || !record) return false

      room.delete(recordId)
      if (room.size === 0) this.records.delete(roomId)

      const stillUsed = new Set(this.list(roomId).flatMap((r) => r.associatedMedia))
      for (const filename of record.associatedMedia) {
        if (stillUsed.has(filename)) continue
        if (basename(filename) !== filename) {
          log.warn('Ignoring media entry outside the media directory', { roomId, recordId, filename })
          continue
        }
        await this.removeFile(join(this.mediaDir(roomId), filename), { roomId, recordId })
      }

      await this.removeFile(this.recordPath(roomId, recordId), { roomId, recordId })
      log.debug('Record deleted', { roomId, recordId })
      return true
    })
  }

  /** Drop every record and file of a room, leaving an empty room directory. */
  clear(roomId: string): Promise<number> {
    return this.locks.run(roomId, async () => {
      const removed = this.records.get(roomId)?.size ?? 0
      this.records.delete(roomId)

      const dir = this.roomDir(roomId)
      await rm(dir, { recursive: true, force: true })
      await mkdir(dir, { recursive: true })
      log.info('Room cleared', { roomId, removed })
      return removed
    })
  }

  /**
   * Remove room directories left without entries (an empty media
   * directory counts as no entry). Returns the removed room ids.
   * `exclusive` wraps each room's check, as the sweeper's room passes are.
   */
  async removeEmptyRoomDirs(
    exclusive: RoomExclusive = <T>(_roomId: string, task: () => Promise<T>): Promise<T> => task(),
  ): Promise<string[]> {
    let names: string[]
    try {
      const entries = await readdir(this.rootDir, { withFileTypes: true })
      names = entries.filter((e) => e.isDirectory() && isValidRoomId(e.name)).map((e) => e.name)
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT')) {
        log.error('Cannot scan record directory', { rootDir: this.rootDir, error: errorMessage(error) })
      }
      return []
    }

    const removed: string[] = []
    for (const roomId of names) {
      const didRemove = await exclusive(roomId, () =>
        this.locks.run(roomId, () => this.removeRoomDirIfEmpty(roomId)),
      )
      if (didRemove) removed.push(roomId)
    }
    return removed
  }

  /* ---------------------------------------------------------------- */
  /*  Internals                                                        */
  /* ---------------------------------------------------------------- */

  private index(record: MentionRecord): void {
    let room = this.records.get(record.roomId)
    if (!room) {
      room = new Map()
      this.records.set(record.roomId, room)
    }
    room.set(record.id, record)
  }

  private async removeRoomDirIfEmpty(roomId: string): Promise<boolean> {
    const dir = this.roomDir(roomId)
    try {
      let entries = await readdir(dir)
      if (entries.length === 1 && entries[0] === MEDIA_DIR) {
        const media = await readdir(join(dir, MEDIA_DIR))
        if (media.length > 0) return false
        await rmdir(join(dir, MEDIA_DIR))
        entries = []
      }
      if (entries.length > 0) return false
      await rmdir(dir)
      log.debug('Removed empty room directory', { roomId })
      return true
    } catch (error) {
      log.error('Failed to remove empty room directory', { roomId, error: errorMessage(error) })
      return false
    }
  }

  private async removeFile(path: string, context: Record<string, unknown>): Promise<void> {
    try {
      await unlink(path)
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return
      log.error('Failed to delete file', { ...context, path, error: errorMessage(error) })
    }
  }
}
