#!/usr/bin/env node

import { CommandRegistry, CommandContext, CommandResult, defaultCommands } from '../commands'
import { ConfigLoader } from '../config/ConfigLoader'
import { ReportService } from '../service/ReportService'
import { debugLog } from '../logging/debugLog'
import { errorMessage } from '../contracts'

/**
 * The service and its warehouse sink are built on first use
 */
export function createContext(configLoader: ConfigLoader = new ConfigLoader()): CommandContext {
  const config = configLoader.getConfig()
  let service: ReportService | undefined
  return {
    config,
    get service(): ReportService {
      service ??= ReportService.fromConfig(config)
      return service
    },
  }
}

export async function run(
  argv: string[],
  context: CommandContext = createContext(),
  registry: CommandRegistry = CommandRegistry.createWithDefaults(defaultCommands)
): Promise<CommandResult> {
  const [name, ...args] = argv

  if (!name || name === 'help' || name === '--help' || name === '-h') {
    return { exitCode: name ? 0 : 1, output: registry.usage() }
  }

  const command = registry.get(name)
  if (!command) {
    return { exitCode: 1, output: `Unknown command: ${name}\n\n${registry.usage()}` }
  }

  debugLog({ event: 'command_start', command: command.name, args })
  try {
    return await command.execute(context, args)
  } catch (error) {
    return { exitCode: 1, output: `${command.name} failed: ${errorMessage(error)}` }
  }
}

// Only run if this is the main module
if (require.main === module) {
  void (async () => {
    try {
      const result = await run(process.argv.slice(2))
      if (result.exitCode === 0) {
        console.log(result.output)
      } else {
        console.error(result.output)
      }
      // exitCode rather than exit(): `serve` keeps the process alive
      process.exitCode = result.exitCode
    } catch (error) {
      console.error('buildtrace failed:', error)
      process.exitCode = 1
    }
  })()
}
