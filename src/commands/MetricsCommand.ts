import { Command, CommandResult } from './types'
import { JsonlWarehouseSink } from '../warehouse/JsonlWarehouseSink'
import { errorMessage } from '../contracts'

export const MetricsCommand: Command = {
  name: 'metrics',
  aliases: ['history'],
  description: 'Show the most recent metrics rows from the local warehouse file',
  usage: 'metrics [limit]',
  execute: async ({ config }, args): Promise<CommandResult> => {
    if (config.warehouse.kind !== 'jsonl') {
      return {
        exitCode: 1,
        output: `Metrics are only readable from the jsonl warehouse (configured: ${config.warehouse.kind}).`,
      }
    }

    const limit = args[0] === undefined ? 10 : Number(args[0])
    if (!Number.isInteger(limit) || limit <= 0) {
      return { exitCode: 1, output: 'Usage: buildtrace metrics [limit]' }
    }

    try {
      const rows = await new JsonlWarehouseSink(config.warehouse.path).readRecent(limit)
      if (rows.length === 0) {
        return { exitCode: 0, output: 'No metrics recorded yet.' }
      }

      let message = 'Recent Jobs:\n'
      for (const row of rows) {
        message += `   job ${row.job_id} [${row.timestamp}] ${row.latency_ms}ms `
        message += `+${row.total_added} -${row.total_removed} ~${row.total_modified} =${row.total_unchanged}\n`
      }
      return { exitCode: 0, output: message.trimEnd() }
    } catch (error) {
      return { exitCode: 1, output: `Failed to read metrics: ${errorMessage(error)}` }
    }
  }
}
