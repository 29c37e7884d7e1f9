export * from './contracts'
export type { Snapshot, SnapshotMetadata, ChangeSet, MovePair, Fingerprint, FingerprintChange } from './snapshot/types'
export { diffSnapshots, detectMoves, assertWellFormed, emptyBaseline } from './snapshot/DiffEngine'
export type { PredecessorResolver } from './snapshot/PredecessorResolver'
export {
  DecrementPredecessorResolver,
  LastKnownPredecessorResolver,
  createPredecessorResolver,
} from './snapshot/PredecessorResolver'
export { toJobRecord, fromJobRecord, metadataOf } from './snapshot/serialization'
export type { SnapshotStore } from './storage/SnapshotStore'
export { FileSnapshotStore } from './storage/FileSnapshotStore'
export { MemorySnapshotStore } from './storage/MemorySnapshotStore'
export * from './warehouse'
export { ReportBuilder, buildMetricsRecord, countChanges, summarize } from './metrics/ReportBuilder'
export * from './formatting'
export { ReportService } from './service/ReportService'
export { ConfigLoader } from './config/ConfigLoader'
export { createApp, startServer } from './server/app'
export { simulateJobs } from './simulator/JobSimulator'
