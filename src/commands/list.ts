import { Command } from 'commander'
import chalk from 'chalk'
import { DeobfConfigManager } from '../lib/deobf'
import { deobfEvents } from '../lib/events'
import { CommonOptions, commonOptions, failCommand, loadProject } from './common'

export function makeListCommand(): Command {
  const list = new Command('list')
    .description('List the deobfuscation configurations of the project and their targets')

  commonOptions(list)

  list.action(async (options: CommonOptions) => {
    try {
      const { project, remapper } = await loadProject(options)

      const manager = new DeobfConfigManager(deobfEvents)
      manager.registerForProject(project, remapper)
      const tracked = manager.getTrackedConfigurations(project)

      console.log(chalk.bold.underline('Deobfuscation Configurations:'))
      if (tracked.length === 0) {
        console.log(chalk.yellow('No deobfuscation configurations registered.'))
        return
      }
      for (const marker of tracked) {
        const count = marker.deobfConfiguration.dependencies.size
        const suffix = count > 0 ? chalk.gray(` (${count} ${count === 1 ? 'dependency' : 'dependencies'})`) : ''
        console.log(`- ${chalk.cyan(marker.deobfConfiguration.name)} -> ${marker.targetConfiguration.name}${suffix}`)
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return list
}
