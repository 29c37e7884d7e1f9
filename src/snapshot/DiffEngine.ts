import { ChangeSet, Fingerprint, FingerprintChange, MovePair, Snapshot, SnapshotMetadata } from './types'
import { MalformedSnapshotError } from '../contracts'
import { debugLog } from '../logging/debugLog'

// Code-unit order, independent of locale
export const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/**
 * Throw if a snapshot violates the shape ingestion is supposed to guarantee
 */
export function assertWellFormed(snapshot: Snapshot): void {
  if (!Number.isInteger(snapshot.jobId) || snapshot.jobId <= 0) {
    throw new MalformedSnapshotError(`job id must be a positive integer, got ${snapshot.jobId}`)
  }
  if (typeof snapshot.timestamp !== 'string' || snapshot.timestamp.length === 0) {
    throw new MalformedSnapshotError('timestamp is missing', snapshot.jobId)
  }
  if (!Number.isInteger(snapshot.latencyMs) || snapshot.latencyMs < 0) {
    throw new MalformedSnapshotError(
      `latency must be a non-negative integer, got ${snapshot.latencyMs}`,
      snapshot.jobId
    )
  }
  for (const [key, fingerprint] of snapshot.objects) {
    if (typeof fingerprint !== 'string') {
      throw new MalformedSnapshotError(`fingerprint of "${key}" is not a string`, snapshot.jobId)
    }
  }
}

/**
 * Snapshot with no objects, used as the baseline for a job that has no predecessor
 */
export function emptyBaseline(meta: SnapshotMetadata): Snapshot {
  return {
    jobId: meta.jobId,
    timestamp: meta.timestamp,
    latencyMs: meta.latencyMs,
    objects: new Map(),
  }
}

/**
 * Classify every key of both snapshots and annotate moves.
 *
 * Key lists come back sorted. `added`, `removed`, `modified` and `unchanged`
 * partition the union of both key sets; moved keys stay in `added`/`removed`.
 */
export function diffSnapshots(previous: Snapshot, current: Snapshot): ChangeSet {
  assertWellFormed(previous)
  assertWellFormed(current)

  const added: string[] = []
  const removed: string[] = []
  const modified: string[] = []
  const unchanged: string[] = []
  const details = new Map<string, FingerprintChange>()

  // Check for removed and modified objects
  for (const [key, before] of previous.objects) {
    const after = current.objects.get(key)

    if (after === undefined) {
      removed.push(key)
      details.set(key, { before, after: null })
    } else if (after !== before) {
      modified.push(key)
      details.set(key, { before, after })
    } else {
      unchanged.push(key)
    }
  }

  // Check for added objects
  for (const [key, after] of current.objects) {
    if (!previous.objects.has(key)) {
      added.push(key)
      details.set(key, { before: null, after })
    }
  }

  added.sort(compareKeys)
  removed.sort(compareKeys)
  modified.sort(compareKeys)
  unchanged.sort(compareKeys)

  const moved = detectMoves(added, removed, previous, current)

  debugLog({
    event: 'diff_snapshots_complete',
    previousJobId: previous.jobId,
    currentJobId: current.jobId,
    added: added.length,
    removed: removed.length,
    modified: modified.length,
    unchanged: unchanged.length,
    moved: moved.length,
  })

  return { added, removed, modified, unchanged, moved, details }
}

/**
 * Pair removed keys with added keys carrying the same fingerprint.
 *
 * When several keys share a fingerprint, both sides are sorted and paired
 * index by index; leftovers on the longer side stay unpaired.
 */
export function detectMoves(
  added: readonly string[],
  removed: readonly string[],
  previous: Snapshot,
  current: Snapshot
): MovePair[] {
  const addedByFingerprint = groupByFingerprint(added, current.objects)
  const removedByFingerprint = groupByFingerprint(removed, previous.objects)
  const moves: MovePair[] = []

  for (const [fingerprint, sources] of removedByFingerprint) {
    const targets = addedByFingerprint.get(fingerprint)
    if (!targets) continue

    const pairCount = Math.min(sources.length, targets.length)
    for (let i = 0; i < pairCount; i++) {
      moves.push({ from: sources[i], to: targets[i], fingerprint })
    }
  }

  return moves.sort((a, b) => compareKeys(a.from, b.from))
}

function groupByFingerprint(
  keys: readonly string[],
  objects: ReadonlyMap<string, Fingerprint>
): Map<Fingerprint, string[]> {
  const groups = new Map<Fingerprint, string[]>()

  for (const key of keys) {
    const fingerprint = objects.get(key)
    if (fingerprint === undefined) {
      throw new Error(`Key "${key}" is not part of the snapshot it was classified from`)
    }
    const group = groups.get(fingerprint)
    if (group) {
      group.push(key)
    } else {
      groups.set(fingerprint, [key])
    }
  }

  for (const group of groups.values()) {
    group.sort(compareKeys)
  }

  return groups
}
