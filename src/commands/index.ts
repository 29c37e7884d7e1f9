export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { ReportCommand } from './ReportCommand'
export { IngestCommand } from './IngestCommand'
export { MetricsCommand } from './MetricsCommand'
export { SimulateCommand } from './SimulateCommand'
export { ServeCommand } from './ServeCommand'
export { VersionCommand } from './VersionCommand'

import { ReportCommand } from './ReportCommand'
import { IngestCommand } from './IngestCommand'
import { MetricsCommand } from './MetricsCommand'
import { SimulateCommand } from './SimulateCommand'
import { ServeCommand } from './ServeCommand'
import { VersionCommand } from './VersionCommand'

export const defaultCommands = [
  ServeCommand,
  IngestCommand,
  ReportCommand,
  MetricsCommand,
  SimulateCommand,
  VersionCommand,
]
