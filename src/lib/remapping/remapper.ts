import { Dependency, ExternalModuleDependency, MappingsDescriptor } from '../types'

/**
 * Translates a dependency in its obfuscated form into its deobfuscated equivalent.
 */
export interface DependencyRemapper {
  remap(dependency: ExternalModuleDependency): Dependency
}

export const MAPPED_VERSION_SEPARATOR = '_mapped_'

export function mappingsId(mappings: MappingsDescriptor): string {
  return `${mappings.channel}_${mappings.version}`
}

/**
 * Remaps a module onto the version published for a mapping set:
 * `1.0` with `snapshot`/`20200101` becomes `1.0_mapped_snapshot_20200101`.
 * The input dependency is left untouched.
 */
export class MappedVersionRemapper implements DependencyRemapper {
  constructor(public readonly mappings: MappingsDescriptor) {}

  remap(dependency: ExternalModuleDependency): ExternalModuleDependency {
    return dependency.withVersion(
      dependency.version + MAPPED_VERSION_SEPARATOR + mappingsId(this.mappings)
    )
  }
}

/**
 * Parses `channel_version` as accepted by `--mappings` and `DEOBF_MAPPINGS`.
 * The version may itself contain underscores, the channel may not.
 */
export function parseMappings(value: string): MappingsDescriptor {
  const index = value.indexOf('_')
  if (index <= 0 || index === value.length - 1) {
    throw new Error(`Invalid mappings "${value}": expected <channel>_<version>, e.g. snapshot_20200101-1.15`)
  }
  return {
    channel: value.slice(0, index),
    version: value.slice(index + 1)
  }
}
