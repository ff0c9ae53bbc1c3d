import { DeobfEventEmitter } from '../events/emitter'
import { moduleCoordinates } from '../parsers/dependency'
import { DependencyArtifact, ExternalModuleDependency, Project } from '../types'

export const POM_TYPE = 'pom'

/**
 * Attaches a `pom` artifact to a module dependency, named after its existing artifact(s).
 *
 * Failures are reported through the project's logger and leave the dependency untouched:
 * a dependency without artifacts, or whose artifacts disagree on their name, has no
 * unambiguous name for the pom artifact.
 */
export function attachPomArtifact(
  project: Project,
  dependency: ExternalModuleDependency,
  emitter?: DeobfEventEmitter
): void {
  const [first] = dependency.artifacts
  if (first === undefined) {
    project.logger.error(
      `No artifacts found. The dependency: ${moduleCoordinates(dependency)} has no artifacts. POM resolution not possible.`
    )
    return
  }

  const names = new Set(dependency.artifacts.map(a => a.name))
  if (names.size > 1) {
    project.logger.error(
      `Multiple different artifact names found. The dependency: ${moduleCoordinates(dependency)} contains multiple artifacts with different names. POM resolution not possible.`
    )
    return
  }

  const pomArtifact: DependencyArtifact = {
    name: first.name,
    type: POM_TYPE,
    extension: POM_TYPE,
    classifier: ''
  }
  dependency.addArtifact(pomArtifact)

  emitter?.emitEvent({
    type: 'pom_artifact_attached',
    level: 'debug',
    data: {
      dependency: moduleCoordinates(dependency),
      artifactName: first.name
    }
  })
}
