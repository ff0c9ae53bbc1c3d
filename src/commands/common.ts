import { Command } from 'commander'
import * as dotenv from 'dotenv'
import * as path from 'path'
import { LoadedProject, ProjectLoader } from '../lib/core/loader'
import { CLIEventAdapter, deobfEvents, toVerbosityLevel } from '../lib/events'
import { JAVA_PLUGIN_ID } from '../lib/host/project'

export interface CommonOptions {
  project: string
  dotenv?: string
  mappings?: string
  verbose: number
}

// Converts library events to console output for every command
export const cliAdapter = new CLIEventAdapter(deobfEvents)

/**
 * Adds the --project option to a command.
 */
export const projectOption = (cmd: Command): Command =>
  cmd.option('-p, --project <path>', 'Project root directory containing deobf.yaml', process.cwd())

/**
 * Adds the --dotenv option to a command.
 */
export const dotenvOption = (cmd: Command): Command =>
  cmd.option('--dotenv <path>', 'Path to a custom .env file')

/**
 * Adds the --mappings option to a command.
 */
export const mappingsOption = (cmd: Command): Command =>
  cmd.option('-m, --mappings <channel_version>', 'Mappings to remap with, e.g. snapshot_20200101. Can also be set via DEOBF_MAPPINGS env var.')

/**
 * Adds verbosity options to a command.
 */
export const verbosityOption = (cmd: Command): Command =>
  cmd.option('-v, --verbose', 'Enable verbose logging (use -vv or -vvv for more detail)', (_: string, previous: number) => previous + 1, 0)

export const commonOptions = (cmd: Command): Command =>
  verbosityOption(mappingsOption(dotenvOption(projectOption(cmd))))

/**
 * Loads environment variables from the specified .env file path.
 */
export function loadDotenv(options: { dotenv?: string }): void {
  const dotenvPath = options.dotenv ? path.resolve(options.dotenv) : path.resolve(process.cwd(), '.env')
  dotenv.config({ path: dotenvPath })
}

/**
 * Applies the common options and loads the project, emitting the corresponding events.
 */
export async function loadProject(options: CommonOptions): Promise<LoadedProject> {
  loadDotenv(options)
  cliAdapter.setVerbosity(toVerbosityLevel(options.verbose))

  const projectRoot = path.resolve(options.project)
  deobfEvents.emitEvent({
    type: 'project_loading_started',
    level: 'info',
    data: { projectRoot }
  })

  const loader = new ProjectLoader(projectRoot, deobfEvents, { mappings: options.mappings })
  const loaded = await loader.load()

  deobfEvents.emitEvent({
    type: 'project_loaded',
    level: 'info',
    data: {
      projectName: loaded.project.name,
      sourceSetCount: loaded.project.hasPlugin(JAVA_PLUGIN_ID) ? loaded.descriptor.sourceSets.length : 0,
      configurationCount: loaded.project.configurations.getNames().length
    }
  })
  return loaded
}

/**
 * Reports a command failure and exits with status 1.
 */
export function failCommand(error: unknown): never {
  deobfEvents.emitEvent({
    type: 'cli_error',
    level: 'error',
    data: {
      message: error instanceof Error ? error.message : String(error)
    }
  })
  process.exit(1)
}
