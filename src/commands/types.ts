import { BuildTraceConfig } from '../contracts'
import { ReportService } from '../service/ReportService'

export interface CommandResult {
  exitCode: 0 | 1
  output: string
}

export interface CommandContext {
  config: BuildTraceConfig
  service: ReportService
}

export interface Command {
  name: string
  aliases?: string[]
  description: string
  usage?: string
  execute: (context: CommandContext, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
}
