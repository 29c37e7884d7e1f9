import { Command, CommandResult } from './types'
import { NotFoundError, errorMessage } from '../contracts'
import { renderReport } from '../formatting/ReportRenderer'

export const ReportCommand: Command = {
  name: 'report',
  description: 'Diff a job against its predecessor and print the change report',
  usage: 'report <jobId> [--json]',
  execute: async ({ service }, args): Promise<CommandResult> => {
    const [rawJobId, ...flags] = args
    const jobId = Number(rawJobId)
    if (!rawJobId || !/^\d+$/.test(rawJobId) || !Number.isSafeInteger(jobId) || jobId <= 0) {
      return { exitCode: 1, output: 'Usage: buildtrace report <jobId> [--json]\nJob ID must be positive.' }
    }

    try {
      const report = await service.report(jobId)
      return {
        exitCode: 0,
        output: flags.includes('--json') ? JSON.stringify(report, null, 2) : renderReport(report),
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { exitCode: 1, output: error.message }
      }
      return { exitCode: 1, output: `Failed to build report: ${errorMessage(error)}` }
    }
  }
}
