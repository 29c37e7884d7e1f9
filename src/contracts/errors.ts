export type BuildTraceErrorCode =
  | 'NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'WAREHOUSE_INSERT_FAILED'
  | 'MALFORMED_SNAPSHOT'
  | 'SNAPSHOT_CONFLICT'

export class BuildTraceError extends Error {
  constructor(
    readonly code: BuildTraceErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * No snapshot is stored for the requested job
 */
export class NotFoundError extends BuildTraceError {
  constructor(readonly jobId: number) {
    super('NOT_FOUND', `No snapshot stored for job ${jobId}`)
  }
}

/**
 * The snapshot store could not be read or written. Never means "absent".
 */
export class StoreUnavailableError extends BuildTraceError {
  constructor(
    readonly jobId: number | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('STORE_UNAVAILABLE', message, options)
  }
}

export class WarehouseInsertError extends BuildTraceError {
  constructor(
    readonly jobId: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('WAREHOUSE_INSERT_FAILED', message, options)
  }
}

export class MalformedSnapshotError extends BuildTraceError {
  constructor(
    message: string,
    readonly jobId?: number
  ) {
    super('MALFORMED_SNAPSHOT', jobId === undefined ? message : `Job ${jobId}: ${message}`)
  }
}

/**
 * A different snapshot is already stored for the job. Stored snapshots never change.
 */
export class SnapshotConflictError extends BuildTraceError {
  constructor(readonly jobId: number) {
    super('SNAPSHOT_CONFLICT', `Job ${jobId} is already stored with a different snapshot`)
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
