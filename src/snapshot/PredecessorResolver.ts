import { PredecessorStrategy } from '../contracts'
import { SnapshotStore } from '../storage/SnapshotStore'

/**
 * Decides which job a report diffs against.
 * `null` means the job has no predecessor and acts as its own baseline.
 */
export interface PredecessorResolver {
  resolvePredecessor(jobId: number): Promise<number | null>
}

/**
 * Assumes contiguous job ids: the predecessor of N is N - 1
 */
export class DecrementPredecessorResolver implements PredecessorResolver {
  async resolvePredecessor(jobId: number): Promise<number | null> {
    const previous = jobId - 1
    return previous > 0 ? previous : null
  }
}

/**
 * Picks the highest stored job id below the requested one
 */
export class LastKnownPredecessorResolver implements PredecessorResolver {
  constructor(private store: SnapshotStore) {}

  async resolvePredecessor(jobId: number): Promise<number | null> {
    const jobIds = await this.store.list()

    let best: number | null = null
    for (const candidate of jobIds) {
      if (candidate < jobId && (best === null || candidate > best)) {
        best = candidate
      }
    }
    return best
  }
}

export function createPredecessorResolver(
  strategy: PredecessorStrategy,
  store: SnapshotStore
): PredecessorResolver {
  switch (strategy) {
    case 'decrement':
      return new DecrementPredecessorResolver()
    case 'last-known':
      return new LastKnownPredecessorResolver(store)
  }
}
