import { promises as fs } from 'fs'
import path from 'path'
import { WarehouseSink, toWarehouseRow } from './WarehouseSink'
import {
  MetricsRecord,
  WarehouseInsertError,
  WarehouseRow,
  WarehouseRowSchema,
  errorMessage,
} from '../contracts'
import { debugLog } from '../logging/debugLog'

/**
 * Appends one JSON row per line to a local file
 */
export class JsonlWarehouseSink implements WarehouseSink {
  readonly name = 'jsonl'

  constructor(private filePath: string) {}

  async insert(record: MetricsRecord): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.appendFile(this.filePath, `${JSON.stringify(toWarehouseRow(record))}\n`, 'utf8')
    } catch (error) {
      throw new WarehouseInsertError(
        record.jobId,
        `Failed to append metrics row to ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      )
    }
  }

  /**
   * Most recent rows first. Lines that do not parse as a row are skipped.
   */
  async readRecent(limit?: number): Promise<WarehouseRow[]> {
    let data: string
    try {
      data = await fs.readFile(this.filePath, 'utf8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return []
      }
      throw error
    }

    const rows: WarehouseRow[] = []
    for (const line of data.split('\n')) {
      if (!line.trim()) continue
      try {
        rows.push(WarehouseRowSchema.parse(JSON.parse(line)))
      } catch (error) {
        debugLog({
          event: 'warehouse_row_skipped',
          file: this.filePath,
          error: errorMessage(error),
        })
      }
    }

    rows.reverse()
    return limit ? rows.slice(0, limit) : rows
  }
}
