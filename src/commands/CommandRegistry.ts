import { Command, CommandRegistry as ICommandRegistry } from './types'

/**
 * Commands in registration order, looked up by name or alias (case-insensitive)
 */
export class CommandRegistry implements ICommandRegistry {
  private commands: Command[] = []
  private byName: Map<string, Command> = new Map()

  register(command: Command): void {
    const names = [command.name, ...(command.aliases ?? [])].map((name) => name.toLowerCase())

    for (const name of names) {
      const taken = this.byName.get(name)
      if (taken && taken !== command) {
        throw new Error(`Command name "${name}" is already used by "${taken.name}"`)
      }
    }

    for (const name of names) {
      this.byName.set(name, command)
    }
    if (!this.commands.includes(command)) {
      this.commands.push(command)
    }
  }

  get(name: string): Command | undefined {
    return this.byName.get(name.toLowerCase())
  }

  getAll(): Command[] {
    return [...this.commands]
  }

  usage(): string {
    const lines = this.commands.map((command) =>
      `   ${(command.usage ?? command.name).padEnd(28)} ${command.description}`
    )
    return `Usage: buildtrace <command> [args]\n\nCommands:\n${lines.join('\n')}`
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    commands.forEach((command) => registry.register(command))
    return registry
  }
}
