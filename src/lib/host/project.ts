import { DeobfEventEmitter } from '../events/emitter'
import {
  ConfigurationContainer,
  HostLogger,
  Project,
  SourceSetContainer,
  UnknownPluginError
} from '../types'
import { DefaultConfigurationContainer } from './configuration'
import { EventHostLogger } from './logger'
import { DefaultSourceSet } from './source-set'

export const JAVA_PLUGIN_ID = 'java'

export interface InMemoryProjectOptions {
  plugins?: string[]
  sourceSets?: string[]
  logger?: HostLogger
  emitter?: DeobfEventEmitter
}

/**
 * Minimal in-process stand-in for a host build tool project.
 *
 * Source sets exist only when the `java` plugin is applied. After-evaluate
 * callbacks run once, in registration order, when `evaluate()` is called.
 */
export class InMemoryProject implements Project {
  public readonly configurations: ConfigurationContainer = new DefaultConfigurationContainer()
  public readonly logger: HostLogger

  private readonly plugins: Set<string>
  private readonly sourceSets: DefaultSourceSet[]
  private readonly afterEvaluateCallbacks: Array<(project: Project) => void> = []
  private evaluated = false

  constructor(public readonly name: string, options: InMemoryProjectOptions = {}) {
    this.plugins = new Set(options.plugins ?? [JAVA_PLUGIN_ID])
    this.sourceSets = (options.sourceSets ?? ['main', 'test']).map(n => new DefaultSourceSet(n))
    this.logger = options.logger ?? new EventHostLogger(name, options.emitter ?? new DeobfEventEmitter())
  }

  hasPlugin(pluginId: string): boolean {
    return this.plugins.has(pluginId)
  }

  getSourceSets(): SourceSetContainer {
    if (!this.plugins.has(JAVA_PLUGIN_ID)) {
      throw new UnknownPluginError(this.name, JAVA_PLUGIN_ID)
    }
    return [...this.sourceSets]
  }

  afterEvaluate(callback: (project: Project) => void): void {
    if (this.evaluated) {
      throw new Error(`Cannot register an after-evaluate callback: project "${this.name}" has already been evaluated.`)
    }
    this.afterEvaluateCallbacks.push(callback)
  }

  get isEvaluated(): boolean {
    return this.evaluated
  }

  /**
   * Marks the build script as evaluated and runs the after-evaluate callbacks.
   */
  evaluate(): void {
    if (this.evaluated) {
      throw new Error(`Project "${this.name}" has already been evaluated.`)
    }
    this.evaluated = true
    for (const callback of this.afterEvaluateCallbacks) {
      callback(this)
    }
    this.afterEvaluateCallbacks.length = 0
  }
}
