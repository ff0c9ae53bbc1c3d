import { attachPomArtifacts } from '../apply'
import { DeobfConfigManager } from '../../lib/deobf'
import { DeobfEventEmitter } from '../../lib/events'
import { DefaultExternalModuleDependency, InMemoryProject } from '../../lib/host'
import { MappedVersionRemapper } from '../../lib/remapping'
import { HostLogger, isExternalModuleDependency } from '../../lib/types'

describe('attachPomArtifacts', () => {
  let logger: { [K in keyof HostLogger]: jest.Mock }
  let project: InMemoryProject
  let manager: DeobfConfigManager

  beforeEach(() => {
    logger = {
      error: jest.fn(),
      warn: jest.fn(),
      info: jest.fn(),
      debug: jest.fn()
    }
    const emitter = new DeobfEventEmitter()
    project = new InMemoryProject('demo', { logger, emitter })
    manager = new DeobfConfigManager(emitter)
  })

  it('should only attach poms to remapped modules that declare artifacts', () => {
    let attached = -1
    manager.onApply(
      project,
      new MappedVersionRemapper({ channel: 'snapshot', version: '20200101' }),
      plan => {
        attached = attachPomArtifacts(manager, plan)
      }
    )
    const deobf = project.configurations.getByName('compileDeobf')
    deobf.dependencies.add(new DefaultExternalModuleDependency('com.example', 'library', '1.0'))
    deobf.dependencies.add(new DefaultExternalModuleDependency('com.example', 'textures', '2.0.1', [
      { name: 'textures', type: 'zip', extension: 'zip' }
    ]))

    project.evaluate()

    expect(attached).toBe(1)
    expect(logger.error).not.toHaveBeenCalled()
    const [library, textures] = project.configurations.getByName('compile').dependencies.toArray()
    expect(isExternalModuleDependency(library) && library.artifacts).toEqual([])
    expect(isExternalModuleDependency(textures) && textures.artifacts).toEqual([
      { name: 'textures', type: 'zip', extension: 'zip' },
      { name: 'textures', type: 'pom', extension: 'pom', classifier: '' }
    ])
  })
})
