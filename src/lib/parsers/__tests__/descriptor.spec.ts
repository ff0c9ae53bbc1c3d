import { parseProjectDescriptor, resolveEnvTokens } from '../descriptor'
import { ProjectDescriptorError } from '../../types'

describe('parseProjectDescriptor', () => {
  it('should parse a complete descriptor', () => {
    const yaml = `
name: example-mod
plugins: [java]
sourceSets: [main, api]
mappings:
  channel: snapshot
  version: '20200101'
configurations:
  implementationDeobf:
    - com.example:library:1.0
    - group: com.example
      name: textures
      version: 2.0.1
      artifacts:
        - name: textures
          extension: zip
  compileOnly:
`
    const descriptor = parseProjectDescriptor(yaml, 'yaml', {})

    expect(descriptor).toEqual({
      name: 'example-mod',
      plugins: ['java'],
      sourceSets: ['main', 'api'],
      mappings: { channel: 'snapshot', version: '20200101' },
      configurations: {
        implementationDeobf: [
          'com.example:library:1.0',
          {
            group: 'com.example',
            name: 'textures',
            version: '2.0.1',
            artifacts: [{ name: 'textures', extension: 'zip' }]
          }
        ],
        compileOnly: []
      }
    })
  })

  it('should apply defaults', () => {
    const descriptor = parseProjectDescriptor('name: minimal', 'yaml', {})

    expect(descriptor.plugins).toEqual(['java'])
    expect(descriptor.sourceSets).toEqual(['main', 'test'])
    expect(descriptor.mappings).toBeUndefined()
    expect(descriptor.configurations).toEqual({})
  })

  it('should parse JSON descriptors', () => {
    const json = JSON.stringify({
      name: 'json-mod',
      plugins: [],
      configurations: { apiDeobf: ['com.example:library:1.0'] }
    })

    const descriptor = parseProjectDescriptor(json, 'json', {})

    expect(descriptor.plugins).toEqual([])
    expect(descriptor.configurations.apiDeobf).toEqual(['com.example:library:1.0'])
  })

  it('should substitute DEOBF_ tokens in dependency versions', () => {
    const yaml = `
name: tokens
configurations:
  apiDeobf:
    - com.example:library:{{ DEOBF_LIBRARY_VERSION }}
    - group: com.example
      name: tool
      version: "{{DEOBF_TOOL_VERSION}}"
`
    const descriptor = parseProjectDescriptor(yaml, 'yaml', { DEOBF_LIBRARY_VERSION: '3.1' })

    expect(descriptor.configurations.apiDeobf).toEqual([
      'com.example:library:3.1',
      { group: 'com.example', name: 'tool', version: '' }
    ])
  })

  it.each([
    ['- just\n- a list', 'Invalid project descriptor: content must resolve to an object.'],
    ['plugins: [java]', 'Invalid project descriptor: "name" field is required and must be a string.'],
    ['name: bad\nplugins: java', 'Invalid project "bad": "plugins" must be an array of strings.'],
    ['name: bad\nsourceSets: [1, 2]', 'Invalid project "bad": "sourceSets" must be an array of strings.'],
    ['name: bad\nmappings: snapshot', 'Invalid project "bad": "mappings" must be an object with "channel" and "version".'],
    ['name: bad\nmappings:\n  version: 1', 'Invalid project "bad": "mappings.channel" is required and must be a string.'],
    ['name: bad\nconfigurations: [a]', 'Invalid project "bad": "configurations" must be a map of configuration names to dependency lists.'],
    ['name: bad\nconfigurations:\n  api: com.example:library:1.0', 'Invalid project "bad": configuration "api" must be a list of dependencies.'],
    [
      'name: bad\nconfigurations:\n  api:\n    - group: com.example\n      version: 1.0.0',
      'Invalid dependency in project "bad", configuration "api": "name" is required and must be a string.'
    ],
    [
      'name: bad\nmappings:\n  channel: stable\n  version: 39.0',
      'Invalid project "bad": "mappings.version" is required and must be a string. Quote numeric versions.'
    ],
    [
      'name: bad\nconfigurations:\n  api:\n    - group: com.example\n      name: lib\n      version: 1.10',
      'Invalid dependency "com.example:lib" in project "bad", configuration "api": "version" is required and must be a string. Quote numeric versions.'
    ]
  ])('should reject %j', (yaml, message) => {
    expect(() => parseProjectDescriptor(yaml, 'yaml', {})).toThrow(ProjectDescriptorError)
    expect(() => parseProjectDescriptor(yaml, 'yaml', {})).toThrow(message)
  })

  it('should keep quoted numeric versions as written', () => {
    const yaml = `
name: quoted
mappings:
  channel: stable
  version: "39.0"
configurations:
  api:
    - group: com.example
      name: lib
      version: "1.10"
`
    const descriptor = parseProjectDescriptor(yaml, 'yaml', {})

    expect(descriptor.mappings).toEqual({ channel: 'stable', version: '39.0' })
    expect(descriptor.configurations.api).toEqual([{ group: 'com.example', name: 'lib', version: '1.10' }])
  })

  it('should report malformed YAML', () => {
    expect(() => parseProjectDescriptor('name: [unclosed', 'yaml', {})).toThrow(
      /^Failed to parse project descriptor: /
    )
  })

  it('should report malformed JSON', () => {
    expect(() => parseProjectDescriptor('{ "name": ', 'json', {})).toThrow(ProjectDescriptorError)
  })
})

describe('resolveEnvTokens', () => {
  it('should leave tokens outside the DEOBF_ namespace intact', () => {
    expect(resolveEnvTokens('1.0-{{HOME}}', { HOME: '/root' })).toBe('1.0-{{HOME}}')
  })

  it('should replace missing DEOBF_ variables with an empty string', () => {
    expect(resolveEnvTokens('1.0{{DEOBF_SUFFIX}}', {})).toBe('1.0')
  })
})
