import { promises as fs } from 'fs'
import { Command, CommandResult } from './types'
import { JobRecordListSchema, SnapshotConflictError, errorMessage } from '../contracts'

export const IngestCommand: Command = {
  name: 'ingest',
  description: 'Validate and store job records from a JSON file',
  usage: 'ingest <file>',
  execute: async ({ service }, args): Promise<CommandResult> => {
    const [filePath] = args
    if (!filePath) {
      return { exitCode: 1, output: 'Usage: buildtrace ingest <file>' }
    }

    let raw: unknown
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf8'))
    } catch (error) {
      return { exitCode: 1, output: `Cannot read ${filePath}: ${errorMessage(error)}` }
    }

    const parsed = JobRecordListSchema.safeParse(raw)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `   ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n')
      return { exitCode: 1, output: `Invalid job records in ${filePath}:\n${issues}` }
    }

    try {
      const accepted = await service.ingest(parsed.data)
      return { exitCode: 0, output: `Stored ${accepted} job(s).` }
    } catch (error) {
      if (error instanceof SnapshotConflictError) {
        return { exitCode: 1, output: `${error.message}; stored snapshots cannot be replaced.` }
      }
      return { exitCode: 1, output: `Failed to store job state: ${errorMessage(error)}` }
    }
  }
}
