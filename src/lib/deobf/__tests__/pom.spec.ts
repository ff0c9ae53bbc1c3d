import { attachPomArtifact } from '../pom'
import { DeobfConfigManager } from '../manager'
import { DeobfEventEmitter } from '../../events/emitter'
import { DefaultExternalModuleDependency } from '../../host/dependency'
import { InMemoryProject } from '../../host/project'
import { HostLogger } from '../../types'

describe('attachPomArtifact', () => {
  let logger: { [K in keyof HostLogger]: jest.Mock }
  let project: InMemoryProject

  beforeEach(() => {
    logger = {
      error: jest.fn(),
      warn: jest.fn(),
      info: jest.fn(),
      debug: jest.fn()
    }
    project = new InMemoryProject('demo', { logger })
  })

  it('should attach a pom artifact named after a single artifact', () => {
    const dependency = new DefaultExternalModuleDependency('com.example', 'foo', '1.0', [
      { name: 'foo', type: 'jar', extension: 'jar' }
    ])

    attachPomArtifact(project, dependency)

    expect(dependency.artifacts).toEqual([
      { name: 'foo', type: 'jar', extension: 'jar' },
      { name: 'foo', type: 'pom', extension: 'pom', classifier: '' }
    ])
    expect(logger.error).not.toHaveBeenCalled()
  })

  it('should treat several artifacts with one name like a single artifact', () => {
    const dependency = new DefaultExternalModuleDependency('com.example', 'foo', '1.0', [
      { name: 'foo', type: 'jar', extension: 'jar' },
      { name: 'foo', type: 'jar', extension: 'jar', classifier: 'sources' }
    ])

    attachPomArtifact(project, dependency)

    expect(dependency.artifacts).toHaveLength(3)
    expect(dependency.artifacts[2]).toEqual({ name: 'foo', type: 'pom', extension: 'pom', classifier: '' })
  })

  it('should report a dependency without artifacts', () => {
    const dependency = new DefaultExternalModuleDependency('com.example', 'foo', '1.0')

    attachPomArtifact(project, dependency)

    expect(dependency.artifacts).toEqual([])
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith(
      'No artifacts found. The dependency: com.example:foo:1.0 has no artifacts. POM resolution not possible.'
    )
  })

  it('should report artifacts with different names', () => {
    const dependency = new DefaultExternalModuleDependency('com.example', 'foo', '1.0', [
      { name: 'foo', type: 'jar', extension: 'jar' },
      { name: 'bar', type: 'jar', extension: 'jar' }
    ])

    attachPomArtifact(project, dependency)

    expect(dependency.artifacts).toHaveLength(2)
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith(
      'Multiple different artifact names found. The dependency: com.example:foo:1.0 contains multiple artifacts with different names. POM resolution not possible.'
    )
  })

  it('should surface failures as host_log events through the default logger', () => {
    const emitter = new DeobfEventEmitter()
    const hostLog = jest.fn()
    emitter.onEvent('host_log', hostLog)
    const eventProject = new InMemoryProject('events', { emitter })

    attachPomArtifact(eventProject, new DefaultExternalModuleDependency('com.example', 'foo', '1.0'))

    expect(hostLog).toHaveBeenCalledTimes(1)
    expect(hostLog.mock.calls[0][0]).toEqual(expect.objectContaining({
      level: 'error',
      data: {
        projectName: 'events',
        message: 'No artifacts found. The dependency: com.example:foo:1.0 has no artifacts. POM resolution not possible.'
      }
    }))
  })

  it('should be reachable through the manager', () => {
    const emitter = new DeobfEventEmitter()
    const attached = jest.fn()
    emitter.onEvent('pom_artifact_attached', attached)
    const manager = new DeobfConfigManager(emitter)
    const dependency = new DefaultExternalModuleDependency('com.example', 'foo', '1.0', [
      { name: 'foo', type: 'jar', extension: 'jar' }
    ])

    manager.addPomArtifact(project, dependency)

    expect(attached.mock.calls[0][0].data).toEqual({ dependency: 'com.example:foo:1.0', artifactName: 'foo' })
  })
})
