import { WarehouseSink, toWarehouseRow } from './WarehouseSink'
import { MetricsRecord, WarehouseRow } from '../contracts'

export class MemoryWarehouseSink implements WarehouseSink {
  readonly name = 'memory'
  private rows: WarehouseRow[] = []

  async insert(record: MetricsRecord): Promise<void> {
    this.rows.push(toWarehouseRow(record))
  }

  getRows(): WarehouseRow[] {
    return [...this.rows]
  }
}
