export type { WarehouseSink } from './WarehouseSink'
export { toWarehouseRow } from './WarehouseSink'
export { JsonlWarehouseSink } from './JsonlWarehouseSink'
export { HttpWarehouseSink } from './HttpWarehouseSink'
export { MemoryWarehouseSink } from './MemoryWarehouseSink'

import { WarehouseSink } from './WarehouseSink'
import { JsonlWarehouseSink } from './JsonlWarehouseSink'
import { HttpWarehouseSink } from './HttpWarehouseSink'
import { BuildTraceConfig } from '../contracts'

/**
 * Returns null when warehouse insertion is switched off
 */
export function createWarehouseSink(config: BuildTraceConfig['warehouse']): WarehouseSink | null {
  switch (config.kind) {
    case 'jsonl':
      return new JsonlWarehouseSink(config.path)
    case 'http':
      if (!config.url) {
        throw new Error('warehouse.url is required when warehouse.kind is "http"')
      }
      return new HttpWarehouseSink(config.url)
    case 'none':
      return null
  }
}
