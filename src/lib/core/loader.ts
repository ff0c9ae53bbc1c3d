import * as fs from 'fs/promises'
import * as path from 'path'
import { DeobfEventEmitter } from '../events/emitter'
import { InMemoryProject } from '../host/project'
import { parseDependencyDescriptor } from '../parsers/dependency'
import { parseProjectDescriptor } from '../parsers/descriptor'
import { DependencyRemapper, MappedVersionRemapper, parseMappings } from '../remapping'
import { MappingsDescriptor, ProjectDescriptor, ProjectDescriptorError } from '../types'

export const DESCRIPTOR_FILE_NAMES = ['deobf.yaml', 'deobf.yml', 'deobf.json']

export const MAPPINGS_ENV_VAR = 'DEOBF_MAPPINGS'

export interface ProjectLoaderOptions {
  /** `channel_version`, takes precedence over the environment and the descriptor */
  mappings?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Finds the project descriptor in the project root.
 * Tries: deobf.yaml, deobf.yml, deobf.json
 */
export async function findDescriptorFile(projectRoot: string): Promise<string | undefined> {
  for (const candidate of DESCRIPTOR_FILE_NAMES) {
    const fullPath = path.join(projectRoot, candidate)
    try {
      await fs.access(fullPath)
      return fullPath
    } catch {
      continue
    }
  }
  return undefined
}

/**
 * Builds an in-memory host project from a descriptor, with every declared
 * configuration created and populated.
 */
export function createProject(descriptor: ProjectDescriptor, emitter: DeobfEventEmitter): InMemoryProject {
  const project = new InMemoryProject(descriptor.name, {
    plugins: descriptor.plugins,
    sourceSets: descriptor.sourceSets,
    emitter
  })

  for (const [name, entries] of Object.entries(descriptor.configurations)) {
    const configuration = project.configurations.maybeCreate(name)
    for (const entry of entries) {
      configuration.dependencies.add(parseDependencyDescriptor(entry))
    }
  }

  return project
}

/**
 * Picks the mappings in order of precedence: explicit option, `DEOBF_MAPPINGS`, descriptor.
 */
export function resolveMappings(
  descriptor: ProjectDescriptor,
  options: ProjectLoaderOptions = {}
): MappingsDescriptor {
  const env = options.env ?? process.env
  if (options.mappings) {
    return parseMappings(options.mappings)
  }
  const fromEnv = env[MAPPINGS_ENV_VAR]
  if (fromEnv) {
    return parseMappings(fromEnv)
  }
  if (descriptor.mappings) {
    return descriptor.mappings
  }
  throw new Error(
    `No mappings configured for project "${descriptor.name}". ` +
    `Set "mappings" in the project descriptor, the ${MAPPINGS_ENV_VAR} environment variable, or pass --mappings.`
  )
}

export interface LoadedProject {
  descriptorPath: string
  descriptor: ProjectDescriptor
  project: InMemoryProject
  remapper: DependencyRemapper
}

export class ProjectLoader {
  constructor(
    private readonly projectRoot: string,
    private readonly emitter: DeobfEventEmitter,
    private readonly options: ProjectLoaderOptions = {}
  ) {}

  async load(): Promise<LoadedProject> {
    const descriptorPath = await findDescriptorFile(this.projectRoot)
    if (!descriptorPath) {
      throw new ProjectDescriptorError(
        `No project descriptor found in ${this.projectRoot}. Expected one of: ${DESCRIPTOR_FILE_NAMES.join(', ')}`
      )
    }

    const content = await fs.readFile(descriptorPath, 'utf-8')
    const format = path.extname(descriptorPath) === '.json' ? 'json' : 'yaml'
    let descriptor: ProjectDescriptor
    try {
      descriptor = parseProjectDescriptor(content, format, this.options.env ?? process.env)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ProjectDescriptorError(`Failed to load ${path.basename(descriptorPath)}: ${message}`)
    }

    const project = createProject(descriptor, this.emitter)
    const remapper = new MappedVersionRemapper(resolveMappings(descriptor, this.options))

    return { descriptorPath, descriptor, project, remapper }
  }
}
