import { Command, CommandResult } from './types'
import { simulateJobs } from '../simulator/JobSimulator'

export const SimulateCommand: Command = {
  name: 'simulate',
  description: 'Print a JSON array of synthetic sequential jobs',
  usage: 'simulate <count> [objects] [seed]',
  execute: async (_context, args): Promise<CommandResult> => {
    const [count, baseObjects = 50, seed = 1] = args.map(Number)
    if (![count, baseObjects, seed].every((value) => Number.isInteger(value)) || count <= 0 || baseObjects <= 0) {
      return { exitCode: 1, output: 'Usage: buildtrace simulate <count> [objects] [seed]' }
    }

    return {
      exitCode: 0,
      output: JSON.stringify(simulateJobs({ count, baseObjects, seed }), null, 2),
    }
  }
}
