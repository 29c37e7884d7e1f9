/**
 * Wire shape of one job submission, as accepted at ingestion and as persisted
 * by the snapshot store.
 */
export interface JobRecord {
  job_id: number
  timestamp: string
  latency_ms: number
  state: Record<string, string>
}

export interface MetricsRecord {
  timestamp: string
  jobId: number
  latencyMs: number
  totalAdded: number
  totalRemoved: number
  totalModified: number
  totalUnchanged: number
}

/**
 * Row layout of the `job_results` warehouse table
 */
export interface WarehouseRow {
  timestamp: string
  job_id: string
  latency_ms: number
  total_added: number
  total_removed: number
  total_modified: number
  total_unchanged: number
}

export type WarehouseStatus =
  | {
      attempted: false
      outcome: 'disabled'
      message: string
    }
  | {
      attempted: true
      outcome: 'succeeded'
      message: string
    }
  | {
      attempted: true
      outcome: 'failed' | 'timed_out'
      message: string
      error: string
    }

export interface ChangeCounts {
  added: number
  removed: number
  modified: number
  unchanged: number
}

export interface ReportMove {
  from: string
  to: string
  fingerprint: string
}

export interface Report {
  reportId: string
  jobId: number
  previousJobId: number | null
  generatedAt: string
  counts: ChangeCounts
  // Keys taking part in a move are listed under `moved` only, but still
  // counted in `counts.added` / `counts.removed`
  changes: {
    added: string[]
    removed: string[]
    modified: string[]
    moved: ReportMove[]
  }
  descriptions: {
    added: string[]
    removed: string[]
    modified: string[]
    moved: string[]
  }
  summary: string
  status: {
    warehouse: WarehouseStatus
  }
}

export type WarehouseKind = 'jsonl' | 'http' | 'none'
export type PredecessorStrategy = 'decrement' | 'last-known'
export type DescriberKind = 'geometry' | 'opaque'

export interface BuildTraceConfig {
  storage: {
    dataDir: string
  }
  warehouse: {
    kind: WarehouseKind
    path: string
    url?: string
    timeoutMs: number
  }
  predecessor: {
    strategy: PredecessorStrategy
  }
  report: {
    describer: DescriberKind
  }
  server: {
    host: string
    port: number
  }
}
