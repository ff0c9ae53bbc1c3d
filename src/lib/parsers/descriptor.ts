import { parse as parseYaml, YAMLParseError } from 'yaml'
import {
  ArtifactDescriptor,
  DependencyDescriptor,
  MappingsDescriptor,
  ModuleDescriptor,
  ProjectDescriptor,
  ProjectDescriptorError
} from '../types'

export const DEFAULT_PLUGINS = ['java']
export const DEFAULT_SOURCE_SETS = ['main', 'test']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

/**
 * Replaces `{{DEOBF_*}}` tokens with environment values. Other tokens are left as-is,
 * missing variables become an empty string.
 */
export function resolveEnvTokens(value: string, env: NodeJS.ProcessEnv = process.env): string {
  const TOKEN_REGEX = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g
  return value.replace(TOKEN_REGEX, (match: string, varName: string) => {
    if (!varName.startsWith('DEOBF_')) {
      return match
    }
    return env[varName] ?? ''
  })
}

/**
 * Parses the raw text of a project descriptor file.
 *
 * @param content File contents
 * @param format `json` for `deobf.json`, `yaml` for everything else
 * @throws {ProjectDescriptorError} If the content is malformed or fails validation.
 */
export function parseProjectDescriptor(
  content: string,
  format: 'yaml' | 'json' = 'yaml',
  env: NodeJS.ProcessEnv = process.env
): ProjectDescriptor {
  let raw: unknown
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYaml(content)
  } catch (e) {
    if (e instanceof YAMLParseError) {
      const line = e.linePos?.[0].line ? ` at line ${e.linePos[0].line}` : ''
      throw new ProjectDescriptorError(`Failed to parse project descriptor: ${e.message}${line}.`)
    }
    if (e instanceof SyntaxError) {
      throw new ProjectDescriptorError(`Failed to parse project descriptor: ${e.message}.`)
    }
    throw e
  }

  return validateProjectDescriptor(raw, env)
}

export function validateProjectDescriptor(raw: unknown, env: NodeJS.ProcessEnv = process.env): ProjectDescriptor {
  if (!isRecord(raw)) {
    throw new ProjectDescriptorError('Invalid project descriptor: content must resolve to an object.')
  }

  const { name, plugins, sourceSets } = raw
  if (typeof name !== 'string' || name.length === 0) {
    throw new ProjectDescriptorError('Invalid project descriptor: "name" field is required and must be a string.')
  }
  if (plugins !== undefined && !isStringArray(plugins)) {
    throw new ProjectDescriptorError(`Invalid project "${name}": "plugins" must be an array of strings.`)
  }
  if (sourceSets !== undefined && !isStringArray(sourceSets)) {
    throw new ProjectDescriptorError(`Invalid project "${name}": "sourceSets" must be an array of strings.`)
  }

  const descriptor: ProjectDescriptor = {
    name,
    plugins: plugins ?? [...DEFAULT_PLUGINS],
    sourceSets: sourceSets ?? [...DEFAULT_SOURCE_SETS],
    configurations: {}
  }

  if (raw.mappings !== undefined) {
    descriptor.mappings = validateMappings(name, raw.mappings)
  }

  const { configurations } = raw
  if (configurations !== undefined) {
    if (!isRecord(configurations)) {
      throw new ProjectDescriptorError(`Invalid project "${name}": "configurations" must be a map of configuration names to dependency lists.`)
    }
    for (const [configurationName, entries] of Object.entries(configurations)) {
      // An empty YAML key (`compile:`) declares the configuration without dependencies
      if (entries === null) {
        descriptor.configurations[configurationName] = []
        continue
      }
      if (!Array.isArray(entries)) {
        throw new ProjectDescriptorError(`Invalid project "${name}": configuration "${configurationName}" must be a list of dependencies.`)
      }
      descriptor.configurations[configurationName] = entries.map((entry: unknown) =>
        validateDependency(name, configurationName, entry, env)
      )
    }
  }

  return descriptor
}

function validateMappings(projectName: string, value: unknown): MappingsDescriptor {
  if (!isRecord(value)) {
    throw new ProjectDescriptorError(`Invalid project "${projectName}": "mappings" must be an object with "channel" and "version".`)
  }
  const { channel, version } = value
  if (typeof channel !== 'string' || channel.length === 0) {
    throw new ProjectDescriptorError(`Invalid project "${projectName}": "mappings.channel" is required and must be a string.`)
  }
  // Unquoted YAML versions are read as numbers and lose digits (1.10 -> 1.1)
  if (typeof version !== 'string' || version.length === 0) {
    throw new ProjectDescriptorError(
      `Invalid project "${projectName}": "mappings.version" is required and must be a string. Quote numeric versions.`
    )
  }
  return { channel, version }
}

function validateDependency(
  projectName: string,
  configurationName: string,
  entry: unknown,
  env: NodeJS.ProcessEnv
): DependencyDescriptor {
  if (typeof entry === 'string') {
    return resolveEnvTokens(entry, env)
  }
  const where = `project "${projectName}", configuration "${configurationName}"`
  if (!isRecord(entry)) {
    throw new ProjectDescriptorError(`Invalid dependency in ${where}: expected a notation string or an object.`)
  }
  const { group, name, version } = entry
  if (typeof group !== 'string' || group === '') {
    throw new ProjectDescriptorError(`Invalid dependency in ${where}: "group" is required and must be a string.`)
  }
  if (typeof name !== 'string' || name === '') {
    throw new ProjectDescriptorError(`Invalid dependency in ${where}: "name" is required and must be a string.`)
  }
  if (typeof version !== 'string' || version.length === 0) {
    throw new ProjectDescriptorError(
      `Invalid dependency "${group}:${name}" in ${where}: "version" is required and must be a string. Quote numeric versions.`
    )
  }

  const module: ModuleDescriptor = {
    group,
    name,
    version: resolveEnvTokens(version, env)
  }

  const { artifacts } = entry
  if (artifacts !== undefined) {
    if (!Array.isArray(artifacts)) {
      throw new ProjectDescriptorError(`Invalid dependency "${module.group}:${module.name}" in ${where}: "artifacts" must be an array.`)
    }
    module.artifacts = artifacts.map((artifact: unknown) => validateArtifact(module, where, artifact))
  }

  return module
}

function validateArtifact(module: ModuleDescriptor, where: string, value: unknown): ArtifactDescriptor {
  const label = `${module.group}:${module.name}`
  const name = isRecord(value) ? value.name : undefined
  if (!isRecord(value) || typeof name !== 'string') {
    throw new ProjectDescriptorError(`Invalid artifact on "${label}" in ${where}: "name" is required and must be a string.`)
  }
  const artifact: ArtifactDescriptor = { name }
  for (const field of ['type', 'extension', 'classifier'] as const) {
    const fieldValue = value[field]
    if (fieldValue === undefined) {
      continue
    }
    if (typeof fieldValue !== 'string') {
      throw new ProjectDescriptorError(`Invalid artifact "${name}" on "${label}" in ${where}: "${field}" must be a string.`)
    }
    artifact[field] = fieldValue
  }
  return artifact
}
