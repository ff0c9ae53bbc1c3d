import { DeobfEventEmitter } from '../events/emitter'
import { formatDependency } from '../parsers/dependency'
import { DependencyRemapper } from '../remapping'
import {
  Configuration,
  ExternalModuleDependency,
  isExternalModuleDependency,
  Project,
  SourceSet
} from '../types'
import { deobfConfigurationName, OBFUSCATED_CONFIGURATION_NAME } from './constants'
import { DeobfuscationConfigurationMarker, RemapAction, RemapPlan } from './marker'
import { attachPomArtifact } from './pom'

/**
 * Central manager for deobfuscation source configurations.
 *
 * For every tracked target configuration `X` there is a companion configuration
 * (by default `XDeobf`) holding dependencies in their obfuscated form. Once the
 * project is evaluated, every external dependency in the companion is remapped and
 * added to `X`, and the original is kept in the internal `__obfuscated` configuration.
 *
 * Instances are created by whoever drives the host integration and hold state for
 * every project they have seen until `clear` is called.
 */
export class DeobfConfigManager {
  private readonly trackedPerProject: Map<Project, DeobfuscationConfigurationMarker[]> = new Map()

  constructor(private readonly emitter: DeobfEventEmitter = new DeobfEventEmitter()) {}

  /**
   * Makes this manager handle a project. Registers deobfuscation configurations for every
   * source set, and schedules the remap pass to run once the host has evaluated the project.
   * The project's tracking records are dropped after the pass, whether or not it succeeds.
   *
   * Should only be invoked once per project.
   *
   * @param afterRemap Runs with the applied plan, before the records are dropped
   */
  public onApply(
    project: Project,
    remapper: DependencyRemapper,
    afterRemap?: (plan: RemapPlan) => void
  ): void {
    this.registerForProject(project, remapper)

    project.afterEvaluate(() => {
      try {
        const plan = this.plan(project)
        this.apply(plan)
        afterRemap?.(plan)
      } finally {
        this.clear(project)
      }
    })
  }

  /**
   * Registers the deobfuscation configurations of every source set the host reports.
   * Fails with the host's error when the project has no source sets.
   */
  public registerForProject(project: Project, remapper: DependencyRemapper): void {
    for (const sourceSet of project.getSourceSets()) {
      this.registerForSourceSet(project, sourceSet, remapper)
    }
  }

  /**
   * Registers a deobfuscation configuration for each of the source set's compile, runtime,
   * compileOnly, runtimeOnly, implementation and api configurations.
   */
  public registerForSourceSet(project: Project, sourceSet: SourceSet, remapper: DependencyRemapper): void {
    const targets = [
      sourceSet.compileConfigurationName,
      sourceSet.runtimeConfigurationName,
      sourceSet.compileOnlyConfigurationName,
      sourceSet.runtimeOnlyConfigurationName,
      sourceSet.implementationConfigurationName,
      sourceSet.apiConfigurationName
    ].map(name => project.configurations.maybeCreate(name))

    for (const target of targets) {
      this.register(project, target, remapper)
    }
  }

  /**
   * Registers a single deobfuscation configuration for `target`.
   *
   * @param deobf Name or handle of the deobfuscation configuration. Defaults to `<target>Deobf`;
   *   a name is created on the project if missing.
   * @returns The deobfuscation configuration
   */
  public register(
    project: Project,
    target: Configuration,
    remapper: DependencyRemapper,
    deobf: string | Configuration = deobfConfigurationName(target.name)
  ): Configuration {
    const deobfConfiguration = typeof deobf === 'string'
      ? project.configurations.maybeCreate(deobf)
      : deobf
    this.track(project, target, remapper, deobfConfiguration)
    return deobfConfiguration
  }

  /**
   * Starts tracking an existing configuration as a deobfuscation source for `target`.
   *
   * @returns False when an identical record was already tracked
   */
  public track(
    project: Project,
    target: Configuration,
    remapper: DependencyRemapper,
    deobfConfiguration: Configuration
  ): boolean {
    let tracked = this.trackedPerProject.get(project)
    if (!tracked) {
      tracked = []
      this.trackedPerProject.set(project, tracked)
    }

    const marker = new DeobfuscationConfigurationMarker(deobfConfiguration, target, remapper)
    const eventData = {
      projectName: project.name,
      deobfConfiguration: deobfConfiguration.name,
      targetConfiguration: target.name
    }

    if (tracked.some(existing => existing.equals(marker))) {
      this.emitter.emitEvent({ type: 'duplicate_tracking_ignored', level: 'debug', data: eventData })
      return false
    }

    tracked.push(marker)
    this.emitter.emitEvent({ type: 'deobf_configuration_registered', level: 'debug', data: eventData })

    // Distinct remappers on one target all fire; flag it since each adds its own dependency
    const remappers = new Set(tracked.filter(m => m.targetConfiguration === target).map(m => m.remapper))
    if (remappers.size > 1) {
      this.emitter.emitEvent({
        type: 'multiple_remappers_warning',
        level: 'warn',
        data: {
          projectName: project.name,
          targetConfiguration: target.name,
          remapperCount: remappers.size
        }
      })
    }

    return true
  }

  /**
   * Computes the remap actions for the project's current state: one per external
   * dependency sitting in a tracked deobfuscation configuration. Other dependency
   * kinds are skipped. Nothing is added to any configuration.
   */
  public plan(project: Project): RemapPlan {
    const actions: RemapAction[] = []

    for (const marker of this.trackedPerProject.get(project) ?? []) {
      for (const dependency of marker.deobfConfiguration.dependencies.toArray()) {
        if (!isExternalModuleDependency(dependency)) {
          continue
        }
        actions.push(Object.freeze({
          deobfConfiguration: marker.deobfConfiguration,
          targetConfiguration: marker.targetConfiguration,
          original: dependency,
          remapped: marker.remapper.remap(dependency)
        }))
      }
    }

    this.emitter.emitEvent({
      type: 'remap_plan_created',
      level: 'info',
      data: {
        projectName: project.name,
        actionCount: actions.length
      }
    })

    return Object.freeze({
      project,
      actions: Object.freeze(actions)
    })
  }

  /**
   * Executes a plan: adds each remapped dependency to its target configuration and each
   * original, unmodified, to the project's internal obfuscated configuration.
   */
  public apply(plan: RemapPlan): void {
    const { project } = plan
    const obfuscated = project.configurations.maybeCreate(OBFUSCATED_CONFIGURATION_NAME)

    for (const action of plan.actions) {
      action.targetConfiguration.dependencies.add(action.remapped)
      obfuscated.dependencies.add(action.original)

      this.emitter.emitEvent({
        type: 'dependency_remapped',
        level: 'info',
        data: {
          projectName: project.name,
          targetConfiguration: action.targetConfiguration.name,
          original: formatDependency(action.original),
          remapped: formatDependency(action.remapped)
        }
      })
    }

    this.emitter.emitEvent({
      type: 'remap_applied',
      level: 'info',
      data: {
        projectName: project.name,
        actionCount: plan.actions.length
      }
    })
  }

  /**
   * Attaches a pom artifact to a module dependency. See `attachPomArtifact`.
   */
  public addPomArtifact(project: Project, dependency: ExternalModuleDependency): void {
    attachPomArtifact(project, dependency, this.emitter)
  }

  /**
   * Drops every tracking record of a project.
   *
   * @returns The number of records dropped
   */
  public clear(project: Project): number {
    const recordCount = this.trackedPerProject.get(project)?.length ?? 0
    this.trackedPerProject.delete(project)
    this.emitter.emitEvent({
      type: 'registry_cleared',
      level: 'debug',
      data: {
        projectName: project.name,
        recordCount
      }
    })
    return recordCount
  }

  /**
   * Drops the tracking records of every project.
   */
  public clearAll(): void {
    for (const project of Array.from(this.trackedPerProject.keys())) {
      this.clear(project)
    }
  }

  public getTrackedConfigurations(project: Project): ReadonlyArray<DeobfuscationConfigurationMarker> {
    return [...(this.trackedPerProject.get(project) ?? [])]
  }

  public getTrackedProjects(): Project[] {
    return Array.from(this.trackedPerProject.keys())
  }
}
