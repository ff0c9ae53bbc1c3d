/**
 * Describes a project for the in-memory host, as read from `deobf.yaml`.
 */
export interface ProjectDescriptor {
  /** The project name, also used as its identity in log output */
  name: string

  /** Applied plugin ids. `java` provides source sets. */
  plugins: string[]

  /** Source set names, `main` first by convention */
  sourceSets: string[]

  /** Mapping channel and version used by the default remapper */
  mappings?: MappingsDescriptor

  /** Initial configuration contents keyed by configuration name */
  configurations: Record<string, DependencyDescriptor[]>
}

export interface MappingsDescriptor {
  channel: string
  version: string
}

/**
 * Either a string notation (`group:name:version[:classifier][@ext]`,
 * `project(':path')`, `files(a, b)`) or an explicit module object.
 */
export type DependencyDescriptor = string | ModuleDescriptor

export interface ModuleDescriptor {
  group: string
  name: string
  version: string
  artifacts?: ArtifactDescriptor[]
}

export interface ArtifactDescriptor {
  name: string
  type?: string
  extension?: string
  classifier?: string
}
