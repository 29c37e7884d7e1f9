import { MetricsRecord, WarehouseRow } from '../contracts'

/**
 * Destination for one metrics row per report. Implementations reject with
 * WarehouseInsertError; callers treat any rejection as non-fatal.
 */
export interface WarehouseSink {
  readonly name: string
  insert(record: MetricsRecord): Promise<void>
}

export function toWarehouseRow(record: MetricsRecord): WarehouseRow {
  return {
    timestamp: record.timestamp,
    job_id: String(record.jobId),
    latency_ms: record.latencyMs,
    total_added: record.totalAdded,
    total_removed: record.totalRemoved,
    total_modified: record.totalModified,
    total_unchanged: record.totalUnchanged,
  }
}
