export class UnknownPluginError extends Error {
  constructor(
    public readonly projectName: string,
    public readonly pluginId: string
  ) {
    super(`Project "${projectName}" does not have the "${pluginId}" plugin applied.`)
    this.name = 'UnknownPluginError'
  }
}

export class UnknownConfigurationError extends Error {
  constructor(public readonly configurationName: string) {
    super(`Configuration with name '${configurationName}' not found.`)
    this.name = 'UnknownConfigurationError'
  }
}

export class DependencyNotationError extends Error {
  constructor(public readonly notation: string, reason: string) {
    super(`Invalid dependency notation "${notation}": ${reason}`)
    this.name = 'DependencyNotationError'
  }
}

export class ProjectDescriptorError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProjectDescriptorError'
  }
}
