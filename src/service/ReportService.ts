import { SnapshotStore } from '../storage/SnapshotStore'
import { FileSnapshotStore } from '../storage/FileSnapshotStore'
import { PredecessorResolver, createPredecessorResolver } from '../snapshot/PredecessorResolver'
import { diffSnapshots, emptyBaseline } from '../snapshot/DiffEngine'
import { fromJobRecord, metadataOf } from '../snapshot/serialization'
import { ReportBuilder } from '../metrics/ReportBuilder'
import { DescriberFactory } from '../formatting/DescriberFactory'
import { createWarehouseSink } from '../warehouse'
import { BuildTraceConfig, JobRecord, Report } from '../contracts'
import { debugLog } from '../logging/debugLog'

export class ReportService {
  constructor(
    private store: SnapshotStore,
    private resolver: PredecessorResolver,
    private builder: ReportBuilder
  ) {}

  static fromConfig(config: BuildTraceConfig, store?: SnapshotStore): ReportService {
    const snapshotStore = store ?? new FileSnapshotStore(config.storage.dataDir)
    return new ReportService(
      snapshotStore,
      createPredecessorResolver(config.predecessor.strategy, snapshotStore),
      new ReportBuilder({
        sink: createWarehouseSink(config.warehouse),
        describer: DescriberFactory.create(config.report.describer),
        insertTimeoutMs: config.warehouse.timeoutMs,
      })
    )
  }

  /**
   * Store already-validated job records. Stops at the first store failure.
   */
  async ingest(records: JobRecord[]): Promise<number> {
    for (const record of records) {
      await this.store.put(record.job_id, fromJobRecord(record))
    }
    debugLog({ event: 'jobs_ingested', jobIds: records.map((record) => record.job_id) })
    return records.length
  }

  /**
   * Diff a job against its predecessor and build the report.
   * Store errors propagate; warehouse errors are reported in `status`.
   */
  async report(jobId: number): Promise<Report> {
    const current = await this.store.fetch(jobId)
    const previousJobId = await this.resolver.resolvePredecessor(jobId)
    const previous = previousJobId === null ? null : await this.store.fetch(previousJobId)

    debugLog({
      event: 'report_start',
      jobId,
      previousJobId,
      currentObjects: current.objects.size,
      previousObjects: previous?.objects.size ?? 0,
    })

    const changeSet = diffSnapshots(previous ?? emptyBaseline(current), current)
    const { report } = await this.builder.build(
      changeSet,
      previous ? metadataOf(previous) : null,
      metadataOf(current)
    )
    return report
  }
}
