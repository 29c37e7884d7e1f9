import { JobRecord } from '../contracts'
import { Snapshot, SnapshotMetadata } from './types'

/**
 * Convert a Snapshot to its JSON-serializable job record
 */
export function toJobRecord(snapshot: Snapshot): JobRecord {
  return {
    job_id: snapshot.jobId,
    timestamp: snapshot.timestamp,
    latency_ms: snapshot.latencyMs,
    state: Object.fromEntries(snapshot.objects),
  }
}

/**
 * Convert a job record back to Snapshot format
 */
export function fromJobRecord(record: JobRecord): Snapshot {
  return {
    jobId: record.job_id,
    timestamp: record.timestamp,
    latencyMs: record.latency_ms,
    objects: new Map(Object.entries(record.state)),
  }
}

export function metadataOf(snapshot: Snapshot): SnapshotMetadata {
  return {
    jobId: snapshot.jobId,
    timestamp: snapshot.timestamp,
    latencyMs: snapshot.latencyMs,
  }
}

/**
 * Same job metadata and the same key to fingerprint mapping
 */
export function sameSnapshot(a: Snapshot, b: Snapshot): boolean {
  if (a.jobId !== b.jobId || a.timestamp !== b.timestamp || a.latencyMs !== b.latencyMs) {
    return false
  }
  if (a.objects.size !== b.objects.size) return false

  for (const [key, fingerprint] of a.objects) {
    if (b.objects.get(key) !== fingerprint) return false
  }
  return true
}
