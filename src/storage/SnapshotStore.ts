import { Snapshot } from '../snapshot/types'

export interface SnapshotStore {
  /**
   * Rejects with NotFoundError when nothing is stored for the job and with
   * StoreUnavailableError when the backing storage fails
   */
  fetch(jobId: number): Promise<Snapshot>

  put(jobId: number, snapshot: Snapshot): Promise<void>

  // Stored job ids, ascending
  list(): Promise<number[]>
}
