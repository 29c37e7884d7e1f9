import { WarehouseSink, toWarehouseRow } from './WarehouseSink'
import { MetricsRecord, WarehouseInsertError, errorMessage } from '../contracts'

/**
 * POSTs `{ rows: [row] }` to a collector endpoint
 */
export class HttpWarehouseSink implements WarehouseSink {
  readonly name = 'http'

  constructor(
    private url: string,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async insert(record: MetricsRecord): Promise<void> {
    let response: Response
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ rows: [toWarehouseRow(record)] }),
      })
    } catch (error) {
      throw new WarehouseInsertError(
        record.jobId,
        `Collector request failed: ${errorMessage(error)}`,
        { cause: error }
      )
    }

    if (!response.ok) {
      throw new WarehouseInsertError(record.jobId, `Collector responded with ${response.status}`)
    }
  }
}
