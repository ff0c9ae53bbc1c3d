import {
  Dependency,
  DependencyArtifact,
  DependencySet,
  ExternalModuleDependency,
  FileCollectionDependency,
  ProjectDependency
} from '../types'

export class DefaultExternalModuleDependency implements ExternalModuleDependency {
  public readonly kind = 'external'
  private readonly _artifacts: DependencyArtifact[]

  constructor(
    public readonly group: string,
    public readonly name: string,
    public readonly version: string,
    artifacts: DependencyArtifact[] = []
  ) {
    this._artifacts = artifacts.map(a => ({ ...a }))
  }

  get artifacts(): ReadonlyArray<DependencyArtifact> {
    return this._artifacts
  }

  addArtifact(artifact: DependencyArtifact): this {
    this._artifacts.push({ ...artifact })
    return this
  }

  copy(): ExternalModuleDependency {
    return new DefaultExternalModuleDependency(this.group, this.name, this.version, this._artifacts)
  }

  withVersion(version: string): ExternalModuleDependency {
    return new DefaultExternalModuleDependency(this.group, this.name, version, this._artifacts)
  }
}

export function projectDependency(path: string): ProjectDependency {
  return { kind: 'project', path }
}

export function fileDependency(files: string[]): FileCollectionDependency {
  return { kind: 'files', files: [...files] }
}

/**
 * Insertion-ordered dependency bucket. Adding the same dependency object twice is a no-op,
 * equal but distinct objects are both kept.
 */
export class DefaultDependencySet implements DependencySet {
  private readonly items: Dependency[] = []

  get size(): number {
    return this.items.length
  }

  add(dependency: Dependency): void {
    if (!this.items.includes(dependency)) {
      this.items.push(dependency)
    }
  }

  toArray(): Dependency[] {
    return [...this.items]
  }

  [Symbol.iterator](): Iterator<Dependency> {
    return this.toArray()[Symbol.iterator]()
  }
}
