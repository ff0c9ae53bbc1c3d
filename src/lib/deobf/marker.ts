import { Configuration, Dependency, ExternalModuleDependency, Project } from '../types'
import { DependencyRemapper } from '../remapping'

/**
 * Records that the external dependencies of `deobfConfiguration` are to be remapped
 * with `remapper` and added to `targetConfiguration`.
 */
export class DeobfuscationConfigurationMarker {
  constructor(
    public readonly deobfConfiguration: Configuration,
    public readonly targetConfiguration: Configuration,
    public readonly remapper: DependencyRemapper
  ) {
    Object.freeze(this)
  }

  equals(other: DeobfuscationConfigurationMarker): boolean {
    return (
      this.deobfConfiguration === other.deobfConfiguration &&
      this.targetConfiguration === other.targetConfiguration &&
      this.remapper === other.remapper
    )
  }
}

export interface RemapAction {
  readonly deobfConfiguration: Configuration
  readonly targetConfiguration: Configuration
  readonly original: ExternalModuleDependency
  readonly remapped: Dependency
}

/**
 * Pending remap actions for one project, as computed by `DeobfConfigManager.plan`.
 */
export interface RemapPlan {
  readonly project: Project
  readonly actions: ReadonlyArray<RemapAction>
}
