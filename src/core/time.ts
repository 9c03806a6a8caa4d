/**
 * Timestamp helpers for the storage boundary.
 *
 * Records are written with ISO 8601 timestamps. The compact local format
 * `yyyyMMdd HH:mm:ss` is still accepted on read for records written by
 * older deployments.
 */

const COMPACT_PATTERN = /^(\d{4})(\d{2})(\d{2}) (\d{2}):(\d{2}):(\d{2})$/

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0')
}

export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString()
}

/** Parse a stored timestamp. Returns null when the value is unusable. */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value !== 'string' || value.length === 0) return null

  const compact = COMPACT_PATTERN.exec(value)
  if (compact) {
    const [, y, mo, d, h, mi, s] = compact.map(Number)
    const date = new Date(y, mo - 1, d, h, mi, s)
    // Date rolls over invalid parts (month 13 etc.); reject those
    if (
      date.getMonth() !== mo - 1 ||
      date.getDate() !== d ||
      date.getHours() !== h ||
      date.getMinutes() !== mi ||
      date.getSeconds() !== s
    ) {
      return null
    }
    return date.getTime()
  }

  if (!/^\d{4}-\d{2}-\d{2}T/.test(value)) return null
  const ms = Date.parse(value)
  return Number.isNaN(ms) ? null : ms
}

/** Local `yyyyMMddHHmmss`, used inside record ids. */
export function compactStamp(ms: number): string {
  const d = new Date(ms)
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  )
}

export const DAY_MS = 24 * 60 * 60 * 1000
