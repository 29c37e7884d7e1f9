export type Fingerprint = string

export interface SnapshotMetadata {
  jobId: number
  timestamp: string
  latencyMs: number
}

export interface Snapshot extends SnapshotMetadata {
  objects: ReadonlyMap<string, Fingerprint>
}

export interface MovePair {
  from: string
  to: string
  fingerprint: Fingerprint
}

export interface FingerprintChange {
  before: Fingerprint | null
  after: Fingerprint | null
}

export interface ChangeSet {
  added: string[]
  removed: string[]
  modified: string[]
  unchanged: string[]
  moved: MovePair[]
  // Fingerprints on both sides for every added, removed and modified key
  details: ReadonlyMap<string, FingerprintChange>
}
