import { Command, CommandResult } from './types'
import { startServer } from '../server/app'
import { errorMessage } from '../contracts'

export const ServeCommand: Command = {
  name: 'serve',
  aliases: ['start'],
  description: 'Start the ingestion and reporting HTTP service',
  execute: async ({ config, service }): Promise<CommandResult> => {
    const { host, port } = config.server
    try {
      await startServer(service, { host, port })
    } catch (error) {
      return { exitCode: 1, output: `Failed to start server: ${errorMessage(error)}` }
    }
    return { exitCode: 0, output: `buildtrace listening on http://${host}:${port}` }
  }
}
