/**
 * Error types.
 *
 * Per-record problems (RecordFormatError) are caught where they occur and
 * logged; ConfigError is the only one meant to reach the operator.
 */

export class TrackerError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly context?: Readonly<Record<string, unknown>>,
  ) {
    super(message)
    this.name = 'TrackerError'
  }
}

export class ConfigError extends TrackerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

export class RecordFormatError extends TrackerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RECORD_FORMAT_ERROR', context)
    this.name = 'RecordFormatError'
  }
}
