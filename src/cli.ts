import { Command } from 'commander'
import { makeApplyCommand, makeListCommand, makePlanCommand } from './commands'

export function setupCommands(program: Command): void {
  // Make plan the default command when no subcommand is provided
  program.addCommand(makePlanCommand(), {
    isDefault: true,
    hidden: false
  })

  program.addCommand(makeApplyCommand())
  program.addCommand(makeListCommand())
}
