import { Configuration, ConfigurationContainer, DependencySet, UnknownConfigurationError } from '../types'
import { DefaultDependencySet } from './dependency'

export class DefaultConfiguration implements Configuration {
  public readonly dependencies: DependencySet = new DefaultDependencySet()

  constructor(public readonly name: string) {}
}

export class DefaultConfigurationContainer implements ConfigurationContainer {
  private readonly configurations: Map<string, Configuration> = new Map()

  maybeCreate(name: string): Configuration {
    let configuration = this.configurations.get(name)
    if (!configuration) {
      configuration = new DefaultConfiguration(name)
      this.configurations.set(name, configuration)
    }
    return configuration
  }

  findByName(name: string): Configuration | undefined {
    return this.configurations.get(name)
  }

  getByName(name: string): Configuration {
    const configuration = this.configurations.get(name)
    if (!configuration) {
      throw new UnknownConfigurationError(name)
    }
    return configuration
  }

  getNames(): string[] {
    return Array.from(this.configurations.keys())
  }

  [Symbol.iterator](): Iterator<Configuration> {
    return Array.from(this.configurations.values())[Symbol.iterator]()
  }
}
