import { Command, CommandResult } from './types'
import packageJson from '../../package.json'

export const VersionCommand: Command = {
  name: 'version',
  aliases: ['v', '--version', '-v'],
  description: 'Show buildtrace version',
  execute: async (): Promise<CommandResult> => {
    return {
      exitCode: 0,
      output: `buildtrace v${packageJson.version}`,
    }
  }
}
