import { SourceSet } from '../types'

export const MAIN_SOURCE_SET_NAME = 'main'

/**
 * Derives a source set's configuration name the way the host does:
 * the bare scope on `main`, `<sourceSet><Scope>` everywhere else.
 */
export function configurationNameFor(sourceSetName: string, scope: string): string {
  if (sourceSetName === MAIN_SOURCE_SET_NAME) {
    return scope
  }
  return sourceSetName + scope.charAt(0).toUpperCase() + scope.slice(1)
}

export class DefaultSourceSet implements SourceSet {
  public readonly compileConfigurationName: string
  public readonly runtimeConfigurationName: string
  public readonly compileOnlyConfigurationName: string
  public readonly runtimeOnlyConfigurationName: string
  public readonly implementationConfigurationName: string
  public readonly apiConfigurationName: string

  constructor(public readonly name: string) {
    this.compileConfigurationName = configurationNameFor(name, 'compile')
    this.runtimeConfigurationName = configurationNameFor(name, 'runtime')
    this.compileOnlyConfigurationName = configurationNameFor(name, 'compileOnly')
    this.runtimeOnlyConfigurationName = configurationNameFor(name, 'runtimeOnly')
    this.implementationConfigurationName = configurationNameFor(name, 'implementation')
    this.apiConfigurationName = configurationNameFor(name, 'api')
  }
}
