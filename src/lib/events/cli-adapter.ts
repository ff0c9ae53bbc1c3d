import chalk from 'chalk'
import { DeobfEvent } from '../types/events'
import { DeobfEventEmitter } from './emitter'

/**
 * Verbosity levels for filtering console output:
 * 0 (default): errors, warnings and the remap summary
 * 1 (-v): add project loading and every remapped dependency
 * 2 (-vv): add configuration registration
 * 3 (-vvv): full debug, including host logger debug lines
 */
export type VerbosityLevel = 0 | 1 | 2 | 3

export function toVerbosityLevel(value: number): VerbosityLevel {
  if (value <= 0) return 0
  if (value === 1) return 1
  if (value === 2) return 2
  return 3
}

/**
 * CLI adapter that converts structured events into
 * formatted console output using chalk for colors.
 */
export class CLIEventAdapter {
  private emitter: DeobfEventEmitter
  private verbosity: VerbosityLevel
  private readonly listener = (event: DeobfEvent) => this.handleEvent(event)

  constructor(emitter: DeobfEventEmitter, verbosity: VerbosityLevel = 0) {
    this.emitter = emitter
    this.verbosity = verbosity
    this.emitter.onAnyEvent(this.listener)
  }

  /**
   * Updates the verbosity level for this adapter.
   */
  setVerbosity(verbosity: VerbosityLevel): void {
    this.verbosity = verbosity
  }

  /**
   * Determines the minimum verbosity level required to show an event.
   */
  private getEventVerbosityLevel(event: DeobfEvent): VerbosityLevel {
    if (event.type === 'host_log') {
      switch (event.level) {
        case 'error':
        case 'warn':
          return 0
        case 'info':
          return 1
        default:
          return 3
      }
    }

    const level0Events = new Set([
      'remap_plan_created', 'remap_applied', 'multiple_remappers_warning',
      'unhandled_rejection', 'uncaught_exception', 'cli_error'
    ])

    const level1Events = new Set([
      'project_loading_started', 'project_loaded', 'dependency_remapped'
    ])

    const level2Events = new Set([
      'deobf_configuration_registered', 'pom_artifact_attached'
    ])

    if (level0Events.has(event.type)) return 0
    if (level1Events.has(event.type)) return 1
    if (level2Events.has(event.type)) return 2

    // Everything else (registry bookkeeping) is debug output
    return 3
  }

  private handleEvent(event: DeobfEvent): void {
    if (this.verbosity < this.getEventVerbosityLevel(event)) {
      return
    }

    switch (event.type) {
      case 'project_loading_started':
        console.log(chalk.blue(`Loading project from: ${event.data.projectRoot}`))
        break

      case 'project_loaded':
        console.log(chalk.green(`  - Loaded "${event.data.projectName}" with ${event.data.sourceSetCount} source sets and ${event.data.configurationCount} configurations.`))
        break

      case 'deobf_configuration_registered':
        console.log(chalk.gray(`  + ${event.data.deobfConfiguration} -> ${event.data.targetConfiguration}`))
        break

      case 'duplicate_tracking_ignored':
        console.log(chalk.gray(`    already tracking ${event.data.deobfConfiguration} -> ${event.data.targetConfiguration}`))
        break

      case 'multiple_remappers_warning':
        console.warn(chalk.yellow(`Warning: configuration "${event.data.targetConfiguration}" in project "${event.data.projectName}" has ${event.data.remapperCount} remappers; each one adds its own remapped dependency.`))
        break

      case 'remap_plan_created':
        console.log(chalk.blue(`Remap plan for "${event.data.projectName}": ${event.data.actionCount} dependencies`))
        break

      case 'dependency_remapped':
        console.log(chalk.gray(`  ${event.data.original} -> ${chalk.cyan(event.data.remapped)} (${event.data.targetConfiguration})`))
        break

      case 'remap_applied':
        console.log(chalk.green.bold(`Remapped ${event.data.actionCount} dependencies in "${event.data.projectName}".`))
        break

      case 'registry_cleared':
        console.log(chalk.gray(`  cleared ${event.data.recordCount} tracking records for "${event.data.projectName}"`))
        break

      case 'pom_artifact_attached':
        console.log(chalk.gray(`  + pom artifact "${event.data.artifactName}" on ${event.data.dependency}`))
        break

      case 'host_log': {
        const prefix = `[${event.data.projectName}]`
        if (event.level === 'error') {
          console.error(chalk.red(`${prefix} ${event.data.message}`))
        } else if (event.level === 'warn') {
          console.warn(chalk.yellow(`${prefix} ${event.data.message}`))
        } else {
          console.log(chalk.gray(`${prefix} ${event.data.message}`))
        }
        break
      }

      case 'unhandled_rejection':
        console.error(chalk.red('Unhandled Rejection:'), event.data.reason)
        break

      case 'uncaught_exception':
        console.error(chalk.red('Uncaught Exception:'), event.data.error)
        break

      case 'cli_error':
        console.error(chalk.red('Error:'), event.data.message)
        break
    }
  }

  /**
   * Stop listening to events (cleanup method).
   */
  public destroy(): void {
    this.emitter.offAnyEvent(this.listener)
  }
}
