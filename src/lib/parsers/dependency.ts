import {
  Dependency,
  DependencyArtifact,
  DependencyDescriptor,
  DependencyNotationError,
  ExternalModuleDependency
} from '../types'
import { DefaultExternalModuleDependency, fileDependency, projectDependency } from '../host/dependency'

const PROJECT_NOTATION = /^project\(\s*(['"]?)([^'"()]+)\1\s*\)$/
const FILES_NOTATION = /^files\((.*)\)$/

/**
 * Parses a dependency notation into a host dependency.
 *
 * Supported forms:
 * - `group:name:version[:classifier][@extension]`
 * - `project(':path')`
 * - `files('a.jar', 'b.jar')`
 *
 * A classifier or an extension produces a single explicit artifact named after the module.
 *
 * @throws {DependencyNotationError} If the notation matches none of the forms.
 */
export function parseDependencyNotation(notation: string): Dependency {
  const trimmed = notation.trim()

  const projectMatch = PROJECT_NOTATION.exec(trimmed)
  if (projectMatch) {
    return projectDependency(projectMatch[2].trim())
  }

  const filesMatch = FILES_NOTATION.exec(trimmed)
  if (filesMatch) {
    const files = filesMatch[1]
      .split(',')
      .map(f => f.trim().replace(/^['"]|['"]$/g, ''))
      .filter(f => f.length > 0)
    if (files.length === 0) {
      throw new DependencyNotationError(notation, 'files() requires at least one path')
    }
    return fileDependency(files)
  }

  return parseModuleNotation(notation, trimmed)
}

function parseModuleNotation(notation: string, trimmed: string): ExternalModuleDependency {
  const atParts = trimmed.split('@')
  if (atParts.length > 2) {
    throw new DependencyNotationError(notation, 'at most one "@extension" suffix is allowed')
  }
  const [coordinates, extension] = atParts
  if (extension !== undefined && extension.length === 0) {
    throw new DependencyNotationError(notation, 'extension after "@" must not be empty')
  }

  const parts = coordinates.split(':')
  if (parts.length < 3 || parts.length > 4) {
    throw new DependencyNotationError(notation, 'expected group:name:version[:classifier][@extension]')
  }
  if (parts.some(p => p.length === 0)) {
    throw new DependencyNotationError(notation, 'coordinates must not be empty')
  }

  const [group, name, version, classifier] = parts
  const artifacts: DependencyArtifact[] = []
  if (classifier !== undefined || extension !== undefined) {
    const artifact: DependencyArtifact = {
      name,
      type: extension ?? 'jar',
      extension: extension ?? 'jar'
    }
    if (classifier !== undefined) {
      artifact.classifier = classifier
    }
    artifacts.push(artifact)
  }

  return new DefaultExternalModuleDependency(group, name, version, artifacts)
}

/**
 * Converts a descriptor entry (string notation or module object) into a host dependency.
 */
export function parseDependencyDescriptor(descriptor: DependencyDescriptor): Dependency {
  if (typeof descriptor === 'string') {
    return parseDependencyNotation(descriptor)
  }
  const artifacts: DependencyArtifact[] = (descriptor.artifacts ?? []).map(a => {
    const artifact: DependencyArtifact = {
      name: a.name,
      type: a.type ?? a.extension ?? 'jar',
      extension: a.extension ?? a.type ?? 'jar'
    }
    if (a.classifier !== undefined) {
      artifact.classifier = a.classifier
    }
    return artifact
  })
  return new DefaultExternalModuleDependency(descriptor.group, descriptor.name, descriptor.version, artifacts)
}

/**
 * `group:name:version` of a module dependency.
 */
export function moduleCoordinates(dependency: ExternalModuleDependency): string {
  return `${dependency.group}:${dependency.name}:${dependency.version}`
}

export function formatDependency(dependency: Dependency): string {
  switch (dependency.kind) {
    case 'external':
      return moduleCoordinates(dependency)
    case 'project':
      return `project('${dependency.path}')`
    case 'files':
      return `files(${dependency.files.map(f => `'${f}'`).join(', ')})`
  }
}
