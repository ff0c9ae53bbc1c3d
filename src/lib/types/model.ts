/**
 * Contract of the host build tool's object model.
 *
 * Everything in this file is owned by the host. The deobfuscation manager only
 * observes projects, creates configurations by name, reads and adds
 * dependencies, and registers an after-evaluation callback.
 */

export interface DependencyArtifact {
  name: string
  type: string
  extension: string
  /** Empty string or undefined when the artifact has no classifier */
  classifier?: string
  url?: string
}

export interface ExternalModuleDependency {
  readonly kind: 'external'
  readonly group: string
  readonly name: string
  readonly version: string
  readonly artifacts: ReadonlyArray<DependencyArtifact>
  addArtifact(artifact: DependencyArtifact): this
  /** Returns a detached copy, artifacts included */
  copy(): ExternalModuleDependency
  /** Returns a copy with a different version */
  withVersion(version: string): ExternalModuleDependency
}

export interface ProjectDependency {
  readonly kind: 'project'
  readonly path: string
}

export interface FileCollectionDependency {
  readonly kind: 'files'
  readonly files: ReadonlyArray<string>
}

export type Dependency = ExternalModuleDependency | ProjectDependency | FileCollectionDependency

export function isExternalModuleDependency(dependency: Dependency): dependency is ExternalModuleDependency {
  return dependency.kind === 'external'
}

export interface DependencySet extends Iterable<Dependency> {
  readonly size: number
  add(dependency: Dependency): void
  toArray(): Dependency[]
}

export interface Configuration {
  readonly name: string
  readonly dependencies: DependencySet
}

export interface ConfigurationContainer extends Iterable<Configuration> {
  /** Get-or-create by name */
  maybeCreate(name: string): Configuration
  findByName(name: string): Configuration | undefined
  /** @throws UnknownConfigurationError */
  getByName(name: string): Configuration
  getNames(): string[]
}

export interface SourceSet {
  readonly name: string
  readonly compileConfigurationName: string
  readonly runtimeConfigurationName: string
  readonly compileOnlyConfigurationName: string
  readonly runtimeOnlyConfigurationName: string
  readonly implementationConfigurationName: string
  readonly apiConfigurationName: string
}

export type SourceSetContainer = Iterable<SourceSet>

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export interface HostLogger {
  error(message: string): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
}

export interface Project {
  readonly name: string
  readonly configurations: ConfigurationContainer
  readonly logger: HostLogger
  /** @throws UnknownPluginError when the project has no source-set plugin applied */
  getSourceSets(): SourceSetContainer
  afterEvaluate(callback: (project: Project) => void): void
}
