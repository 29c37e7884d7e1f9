import { v4 as uuidv4 } from 'uuid'
import { ChangeSet, FingerprintChange, SnapshotMetadata } from '../snapshot/types'
import { ChangeDescriber } from '../formatting/ChangeDescriber'
import { WarehouseSink } from '../warehouse/WarehouseSink'
import {
  ChangeCounts,
  MetricsRecord,
  Report,
  WarehouseInsertError,
  WarehouseStatus,
  errorMessage,
} from '../contracts'
import { debugLog } from '../logging/debugLog'

export interface ReportBuilderOptions {
  sink: WarehouseSink | null
  describer: ChangeDescriber
  // Upper bound on how long a report waits for the warehouse insert
  insertTimeoutMs: number
}

export interface BuildResult {
  record: MetricsRecord
  report: Report
}

export function countChanges(changeSet: ChangeSet): ChangeCounts {
  return {
    added: changeSet.added.length,
    removed: changeSet.removed.length,
    modified: changeSet.modified.length,
    unchanged: changeSet.unchanged.length,
  }
}

export function buildMetricsRecord(changeSet: ChangeSet, currentMeta: SnapshotMetadata): MetricsRecord {
  const counts = countChanges(changeSet)
  return {
    timestamp: currentMeta.timestamp,
    jobId: currentMeta.jobId,
    latencyMs: currentMeta.latencyMs,
    totalAdded: counts.added,
    totalRemoved: counts.removed,
    totalModified: counts.modified,
    totalUnchanged: counts.unchanged,
  }
}

export function summarize(counts: ChangeCounts, moveCount: number): string {
  const parts: string[] = []
  if (counts.added > 0) parts.push(`${counts.added} item(s) added.`)
  if (counts.removed > 0) parts.push(`${counts.removed} item(s) removed.`)
  if (counts.modified > 0) parts.push(`${counts.modified} item(s) modified.`)
  if (moveCount > 0) parts.push(`${moveCount} move(s) detected.`)

  return parts.length > 0 ? parts.join(' | ') : 'No significant changes detected.'
}

export class ReportBuilder {
  constructor(private options: ReportBuilderOptions) {}

  /**
   * Build the metrics record and report for one diff. The record is handed to
   * the warehouse sink; its outcome lands in `report.status` and never rejects.
   */
  async build(
    changeSet: ChangeSet,
    previousMeta: SnapshotMetadata | null,
    currentMeta: SnapshotMetadata
  ): Promise<BuildResult> {
    const record = buildMetricsRecord(changeSet, currentMeta)
    const warehouse = await this.recordMetrics(record)

    const report: Report = {
      reportId: uuidv4(),
      jobId: currentMeta.jobId,
      previousJobId: previousMeta?.jobId ?? null,
      generatedAt: new Date().toISOString(),
      ...this.describe(changeSet),
      status: { warehouse },
    }

    return { record, report }
  }

  private describe(changeSet: ChangeSet): Pick<Report, 'counts' | 'changes' | 'descriptions' | 'summary'> {
    const { describer } = this.options
    const movedKeys = new Set<string>()
    for (const move of changeSet.moved) {
      movedKeys.add(move.from)
      movedKeys.add(move.to)
    }

    const added = changeSet.added.filter((key) => !movedKeys.has(key))
    const removed = changeSet.removed.filter((key) => !movedKeys.has(key))
    const counts = countChanges(changeSet)

    return {
      counts,
      changes: {
        added,
        removed,
        modified: [...changeSet.modified],
        moved: changeSet.moved.map((move) => ({ ...move })),
      },
      descriptions: {
        added: added.map((key) => describer.describeAdded(key, sideOf(changeSet, key, 'after'))),
        removed: removed.map((key) => describer.describeRemoved(key, sideOf(changeSet, key, 'before'))),
        modified: changeSet.modified.map((key) =>
          describer.describeModified(key, sideOf(changeSet, key, 'before'), sideOf(changeSet, key, 'after'))
        ),
        moved: changeSet.moved.map((move) => describer.describeMove(move)),
      },
      summary: summarize(counts, changeSet.moved.length),
    }
  }

  private async recordMetrics(record: MetricsRecord): Promise<WarehouseStatus> {
    const { sink, insertTimeoutMs } = this.options
    if (!sink) {
      return { attempted: false, outcome: 'disabled', message: 'Warehouse insertion disabled.' }
    }

    // Synchronous throws from the sink become rejections here
    const insertion = Promise.resolve().then(() => sink.insert(record))

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), insertTimeoutMs)
    })

    try {
      const result = await Promise.race([insertion.then(() => 'inserted' as const), timeout])

      if (result === 'timeout') {
        void insertion.catch((error: unknown) => {
          console.error(`Late warehouse insertion failure for job ${record.jobId}: ${errorMessage(error)}`)
        })
        const message = `Insert did not complete within ${insertTimeoutMs}ms`
        console.error(`Warehouse insertion timed out for job ${record.jobId} (${sink.name})`)
        return {
          attempted: true,
          outcome: 'timed_out',
          message: 'Warehouse insertion attempted, timed out.',
          error: message,
        }
      }

      debugLog({ event: 'warehouse_insert_succeeded', jobId: record.jobId, sink: sink.name })
      return { attempted: true, outcome: 'succeeded', message: 'Warehouse insertion attempted, succeeded.' }
    } catch (error) {
      const failure = error instanceof WarehouseInsertError
        ? error
        : new WarehouseInsertError(record.jobId, errorMessage(error), { cause: error })

      console.error(`Warehouse insertion failed for job ${record.jobId} (${sink.name}): ${failure.message}`)
      debugLog({
        event: 'warehouse_insert_failed',
        jobId: record.jobId,
        sink: sink.name,
        error: failure.message,
      })
      return {
        attempted: true,
        outcome: 'failed',
        message: 'Warehouse insertion attempted, failed.',
        error: failure.message,
      }
    } finally {
      clearTimeout(timer)
    }
  }
}

function sideOf(changeSet: ChangeSet, key: string, side: keyof FingerprintChange): string {
  const fingerprint = changeSet.details.get(key)?.[side]
  if (fingerprint === undefined || fingerprint === null) {
    throw new Error(`Change set has no ${side} fingerprint for "${key}"`)
  }
  return fingerprint
}
