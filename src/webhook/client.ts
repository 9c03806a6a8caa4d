/**
 * Admin client for a running webhook server.
 *
 * The CLI uses it so that `clear` and `sweep` go through the live process
 * (its room queue and in-memory index) instead of editing the data
 * directory underneath it.
 */

import * as z from 'zod'
import { TrackerError } from '../core/errors.js'
import type { SweepReport } from '../store/sweeper.js'

const ClearResponseSchema = z.object({ success: z.literal(true), removed: z.number().int() })

const SweepResponseSchema = z.object({
  success: z.literal(true),
  deleted: z.number().int(),
  kept: z.number().int(),
  skippedActive: z.number().int(),
  invalid: z.number().int(),
  removedDirs: z.array(z.string()),
})

export interface AdminClientOptions {
  baseUrl: string
  secret: string
  /** Health-check timeout (default 2000) */
  timeoutMs?: number
  fetch?: typeof fetch
}

export class AdminClient {
  private readonly fetchFn: typeof fetch
  private readonly timeoutMs: number

  constructor(private options: AdminClientOptions) {
    this.fetchFn = options.fetch ?? fetch
    this.timeoutMs = options.timeoutMs ?? 2000
  }

  /** Whether a tracker server answers on the base URL. */
  async isRunning(): Promise<boolean> {
    try {
      const res = await this.fetchFn(`${this.options.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      })
      return res.ok
    } catch {
      return false
    }
  }

  async clearRoom(roomId: string): Promise<number> {
    const body = await this.request('DELETE', `/rooms/${encodeURIComponent(roomId)}/records`)
    return ClearResponseSchema.parse(body).removed
  }

  async sweep(): Promise<SweepReport> {
    const { success: _success, ...report } = SweepResponseSchema.parse(await this.request('POST', '/sweep'))
    return report
  }

  private async request(method: string, path: string): Promise<unknown> {
    const res = await this.fetchFn(`${this.options.baseUrl}${path}`, {
      method,
      headers: { authorization: `Bearer ${this.options.secret}` },
    })
    const body: unknown = await res.json()
    if (!res.ok) {
      const error = z.object({ error: z.string() }).safeParse(body)
      throw new TrackerError(
        `Server rejected ${method} ${path}: ${error.success ? error.data.error : res.status}`,
        'ADMIN_REQUEST_FAILED',
        { status: res.status },
      )
    }
    return body
  }
}
