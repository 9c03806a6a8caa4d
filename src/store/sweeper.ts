/**
 * Retention sweeper.
 *
 * Deletes records that started before `now - horizon`, together with
 * their media, then removes room directories left empty. Runs once at
 * startup and once a day at the configured slot.
 */

import { Cron } from 'croner'
import { DAY_MS } from '../core/time.js'
import { createLogger, errorMessage } from '../infra/logger.js'
import type { RecordStore, RoomExclusive } from './record-store.js'

const log = createLogger('sweeper')

export interface SweepReport {
  deleted: number
  kept: number
  /** Expired records skipped because a session still writes to them */
  skippedActive: number
  /** Records kept because their start time is unreadable */
  invalid: number
  removedDirs: string[]
}

export interface RetentionSweeperOptions {
  store: RecordStore
  retentionDays: number
  sweepHour: number
  sweepMinute: number
  /** Whether an open tracking session still references the record */
  isTracking: (roomId: string, recordId: string) => boolean
  /**
   * Runs one room's pass. The tracker passes its room queue here so a
   * message being resolved and written can't race the media cleanup.
   */
  runExclusive?: RoomExclusive
  now?: () => number
}

export class RetentionSweeper {
  private job: Cron | null = null
  private running: Promise<SweepReport> | null = null
  private readonly store: RecordStore
  private readonly isTracking: RetentionSweeperOptions['isTracking']
  private readonly runExclusive: RoomExclusive
  private readonly now: () => number

  constructor(private options: RetentionSweeperOptions) {
    this.store = options.store
    this.isTracking = options.isTracking
    this.runExclusive =
      options.runExclusive ?? (<T>(_roomId: string, task: () => Promise<T>): Promise<T> => task())
    this.now = options.now ?? Date.now
  }

  get horizonMs(): number {
    return this.options.retentionDays * DAY_MS
  }

  get schedule(): string {
    return `${this.options.sweepMinute} ${this.options.sweepHour} * * *`
  }

  /** Start the daily job. */
  start(): void {
    if (this.job) return
    this.job = new Cron(this.schedule, { protect: true }, () => {
      this.runScheduled().catch((error: unknown) => {
        log.error('Scheduled sweep failed', { error: errorMessage(error) })
      })
    })
    log.info('Daily sweep scheduled', { pattern: this.schedule, next: this.job.nextRun()?.toISOString() })
  }

  stop(): void {
    this.job?.stop()
    this.job = null
  }

  /** Sweep with the configured horizon. Overlapping calls share one run. */
  runScheduled(): Promise<SweepReport> {
    if (!this.running) {
      this.running = this.sweep(this.now(), this.horizonMs).finally(() => {
        this.running = null
      })
    }
    return this.running
  }

  async sweep(now: number, horizonMs: number): Promise<SweepReport> {
    const cutoff = now - horizonMs
    const report: SweepReport = { deleted: 0, kept: 0, skippedActive: 0, invalid: 0, removedDirs: [] }

    for (const roomId of this.store.rooms()) {
      await this.runExclusive(roomId, () => this.sweepRoom(roomId, cutoff, report))
    }

    report.removedDirs = await this.store.removeEmptyRoomDirs(this.runExclusive)
    log.info('Sweep finished', { ...report, removedDirs: report.removedDirs.length })
    return report
  }

  private async sweepRoom(roomId: string, cutoff: number, report: SweepReport): Promise<void> {
    for (const record of this.store.list(roomId)) {
      if (record.startTime === null) {
        log.warn('Keeping record with unreadable start time', { roomId, recordId: record.id })
        report.invalid++
        report.kept++
        continue
      }
      if (record.startTime >= cutoff) {
        report.kept++
        continue
      }
      if (this.isTracking(roomId, record.id)) {
        report.skippedActive++
        report.kept++
        continue
      }

      if (await this.store.delete(roomId, record.id)) {
        report.deleted++
        log.debug('Expired record deleted', { roomId, recordId: record.id })
      }
    }
  }
}
