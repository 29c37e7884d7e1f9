import { SnapshotStore } from './SnapshotStore'
import { Snapshot } from '../snapshot/types'
import { fromJobRecord, sameSnapshot, toJobRecord } from '../snapshot/serialization'
import { JobRecord, MalformedSnapshotError, NotFoundError, SnapshotConflictError } from '../contracts'

export class MemorySnapshotStore implements SnapshotStore {
  // Records are kept serialized so callers never share state with the store
  private data: Map<number, JobRecord> = new Map()

  async fetch(jobId: number): Promise<Snapshot> {
    const record = this.data.get(jobId)
    if (!record) {
      throw new NotFoundError(jobId)
    }
    return fromJobRecord(record)
  }

  async put(jobId: number, snapshot: Snapshot): Promise<void> {
    if (snapshot.jobId !== jobId) {
      throw new MalformedSnapshotError(`snapshot stored under job ${jobId}`, snapshot.jobId)
    }
    const stored = this.data.get(jobId)
    if (stored) {
      if (!sameSnapshot(fromJobRecord(stored), snapshot)) {
        throw new SnapshotConflictError(jobId)
      }
      return
    }
    this.data.set(jobId, toJobRecord(snapshot))
  }

  async list(): Promise<number[]> {
    return Array.from(this.data.keys()).sort((a, b) => a - b)
  }

  async clearAll(): Promise<void> {
    this.data.clear()
  }
}
