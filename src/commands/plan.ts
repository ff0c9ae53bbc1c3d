import { Command } from 'commander'
import chalk from 'chalk'
import { DeobfConfigManager } from '../lib/deobf'
import { deobfEvents } from '../lib/events'
import { formatDependency } from '../lib/parsers/dependency'
import { CommonOptions, commonOptions, failCommand, loadProject } from './common'

export function makePlanCommand(): Command {
  const plan = new Command('plan')
    .description('Show which dependencies would be remapped, without changing any configuration')

  commonOptions(plan)

  plan.action(async (options: CommonOptions) => {
    try {
      const { project, remapper } = await loadProject(options)

      const manager = new DeobfConfigManager(deobfEvents)
      manager.registerForProject(project, remapper)
      const remapPlan = manager.plan(project)

      console.log(chalk.bold.underline(`Remap plan for ${project.name}:`))
      if (remapPlan.actions.length === 0) {
        console.log(chalk.yellow('No external dependencies found in deobfuscation configurations.'))
        return
      }
      for (const action of remapPlan.actions) {
        console.log(`- ${chalk.cyan(action.deobfConfiguration.name)} -> ${chalk.cyan(action.targetConfiguration.name)}`)
        console.log(`  ${chalk.gray(formatDependency(action.original))} => ${formatDependency(action.remapped)}`)
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return plan
}
