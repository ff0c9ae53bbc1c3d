import { InMemoryProject } from '../project'
import { configurationNameFor, DefaultSourceSet } from '../source-set'
import { DefaultDependencySet, DefaultExternalModuleDependency, projectDependency } from '../dependency'
import { UnknownConfigurationError, UnknownPluginError } from '../../types'

describe('configurationNameFor', () => {
  it('should use the bare scope on main', () => {
    expect(configurationNameFor('main', 'compileOnly')).toBe('compileOnly')
  })

  it('should prefix other source sets', () => {
    expect(configurationNameFor('test', 'compileOnly')).toBe('testCompileOnly')
    expect(configurationNameFor('integrationTest', 'api')).toBe('integrationTestApi')
  })

  it('should derive all six names of a source set', () => {
    const sourceSet = new DefaultSourceSet('test')

    expect([
      sourceSet.compileConfigurationName,
      sourceSet.runtimeConfigurationName,
      sourceSet.compileOnlyConfigurationName,
      sourceSet.runtimeOnlyConfigurationName,
      sourceSet.implementationConfigurationName,
      sourceSet.apiConfigurationName
    ]).toEqual(['testCompile', 'testRuntime', 'testCompileOnly', 'testRuntimeOnly', 'testImplementation', 'testApi'])
  })
})

describe('InMemoryProject', () => {
  let project: InMemoryProject

  beforeEach(() => {
    project = new InMemoryProject('demo')
  })

  describe('configurations', () => {
    it('should get or create by name', () => {
      const created = project.configurations.maybeCreate('implementation')

      expect(project.configurations.maybeCreate('implementation')).toBe(created)
      expect(project.configurations.getNames()).toEqual(['implementation'])
    })

    it('should throw for unknown names on getByName only', () => {
      expect(project.configurations.findByName('missing')).toBeUndefined()
      expect(() => project.configurations.getByName('missing')).toThrow(UnknownConfigurationError)
      expect(() => project.configurations.getByName('missing')).toThrow("Configuration with name 'missing' not found.")
    })
  })

  describe('source sets', () => {
    it('should default to main and test', () => {
      expect(Array.from(project.getSourceSets()).map(s => s.name)).toEqual(['main', 'test'])
    })

    it('should require the java plugin', () => {
      const bare = new InMemoryProject('bare', { plugins: ['base'] })

      expect(() => bare.getSourceSets()).toThrow(UnknownPluginError)
      expect(() => bare.getSourceSets()).toThrow('Project "bare" does not have the "java" plugin applied.')
    })
  })

  describe('evaluate', () => {
    it('should run after-evaluate callbacks once, in order', () => {
      const calls: string[] = []
      project.afterEvaluate(p => calls.push(`first:${p.name}`))
      project.afterEvaluate(() => calls.push('second'))

      expect(calls).toEqual([])
      project.evaluate()

      expect(calls).toEqual(['first:demo', 'second'])
      expect(project.isEvaluated).toBe(true)
    })

    it('should reject callbacks and re-evaluation after evaluation', () => {
      project.evaluate()

      expect(() => project.afterEvaluate(() => undefined)).toThrow(
        'Cannot register an after-evaluate callback: project "demo" has already been evaluated.'
      )
      expect(() => project.evaluate()).toThrow('Project "demo" has already been evaluated.')
    })
  })
})

describe('DefaultDependencySet', () => {
  it('should ignore the same dependency object added twice', () => {
    const set = new DefaultDependencySet()
    const dependency = new DefaultExternalModuleDependency('com.example', 'library', '1.0')

    set.add(dependency)
    set.add(dependency)
    set.add(new DefaultExternalModuleDependency('com.example', 'library', '1.0'))
    set.add(projectDependency(':core'))

    expect(set.size).toBe(3)
    expect(Array.from(set)[0]).toBe(dependency)
  })
})
