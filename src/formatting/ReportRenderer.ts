import { Report } from '../contracts'

function section(title: string, lines: string[]): string {
  if (lines.length === 0) return ''
  return `${title}:\n${lines.map((line) => `   ${line}\n`).join('')}\n`
}

/**
 * Plain-text rendering of a report for terminal output
 */
export function renderReport(report: Report): string {
  const baseline = report.previousJobId === null
    ? 'no predecessor (baseline)'
    : `job ${report.previousJobId}`

  let message = `Change report for job ${report.jobId} against ${baseline}\n\n`

  message += `${report.summary}\n\n`

  message += 'Counts:\n'
  message += `   Added: ${report.counts.added}\n`
  message += `   Removed: ${report.counts.removed}\n`
  message += `   Modified: ${report.counts.modified}\n`
  message += `   Unchanged: ${report.counts.unchanged}\n\n`

  message += section('Added', report.descriptions.added)
  message += section('Removed', report.descriptions.removed)
  message += section('Moved', report.descriptions.moved)
  message += section('Modified', report.descriptions.modified)

  const { warehouse } = report.status
  message += `Warehouse: ${warehouse.message}`
  if (warehouse.outcome === 'failed' || warehouse.outcome === 'timed_out') {
    message += ` (${warehouse.error})`
  }

  return message
}
