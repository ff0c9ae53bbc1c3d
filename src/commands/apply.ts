import { Command } from 'commander'
import chalk from 'chalk'
import { DeobfConfigManager, RemapPlan } from '../lib/deobf'
import { deobfEvents } from '../lib/events'
import { formatDependency } from '../lib/parsers/dependency'
import { Dependency, isExternalModuleDependency } from '../lib/types'
import { CommonOptions, commonOptions, failCommand, loadProject } from './common'

interface ApplyOptions extends CommonOptions {
  pom: boolean
  all: boolean
}

function describeDependency(dependency: Dependency): string {
  const label = formatDependency(dependency)
  if (!isExternalModuleDependency(dependency) || dependency.artifacts.length === 0) {
    return label
  }
  const artifacts = dependency.artifacts.map(a =>
    a.classifier ? `${a.name}-${a.classifier}.${a.extension}` : `${a.name}.${a.extension}`
  )
  return `${label} ${chalk.gray(`[${artifacts.join(', ')}]`)}`
}

/**
 * Attaches a pom artifact to every remapped module dependency of the plan that declares
 * artifacts. Plain notations declare none, so there is nothing to derive a pom from.
 *
 * @returns The number of dependencies handed to the manager
 */
export function attachPomArtifacts(manager: DeobfConfigManager, plan: RemapPlan): number {
  let count = 0
  for (const action of plan.actions) {
    if (isExternalModuleDependency(action.remapped) && action.remapped.artifacts.length > 0) {
      manager.addPomArtifact(plan.project, action.remapped)
      count++
    }
  }
  return count
}

export function makeApplyCommand(): Command {
  const apply = new Command('apply')
    .description('Evaluate the project, remap deobfuscation dependencies and print the resulting configurations')
    .option('--pom', 'Attach a pom artifact to every remapped module dependency that declares artifacts', false)
    .option('--all', 'Print empty configurations too', false)

  commonOptions(apply)

  apply.action(async (options: ApplyOptions) => {
    try {
      const { project, remapper } = await loadProject(options)

      const manager = new DeobfConfigManager(deobfEvents)
      manager.onApply(project, remapper, plan => {
        if (options.pom) {
          attachPomArtifacts(manager, plan)
        }
      })
      project.evaluate()

      console.log(chalk.bold.underline(`Configurations of ${project.name}:`))
      for (const configuration of project.configurations) {
        if (configuration.dependencies.size === 0 && !options.all) {
          continue
        }
        console.log(`- ${chalk.cyan(configuration.name)}`)
        for (const dependency of configuration.dependencies) {
          console.log(`    ${describeDependency(dependency)}`)
        }
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return apply
}
