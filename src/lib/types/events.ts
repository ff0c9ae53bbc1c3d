import { LogLevel } from './model'

/**
 * Event system for structured logging throughout registration and the remap pass.
 * Nothing in the library writes to the console directly; the CLI adapter renders these.
 */

export interface BaseEvent {
  type: string
  timestamp: Date
  level: LogLevel
}

// Project loading events
export interface ProjectLoadingStartedEvent extends BaseEvent {
  type: 'project_loading_started'
  level: 'info'
  data: {
    projectRoot: string
  }
}

export interface ProjectLoadedEvent extends BaseEvent {
  type: 'project_loaded'
  level: 'info'
  data: {
    projectName: string
    sourceSetCount: number
    configurationCount: number
  }
}

// Registration events
export interface DeobfConfigurationRegisteredEvent extends BaseEvent {
  type: 'deobf_configuration_registered'
  level: 'debug'
  data: {
    projectName: string
    deobfConfiguration: string
    targetConfiguration: string
  }
}

export interface DuplicateTrackingIgnoredEvent extends BaseEvent {
  type: 'duplicate_tracking_ignored'
  level: 'debug'
  data: {
    projectName: string
    deobfConfiguration: string
    targetConfiguration: string
  }
}

export interface MultipleRemappersWarningEvent extends BaseEvent {
  type: 'multiple_remappers_warning'
  level: 'warn'
  data: {
    projectName: string
    targetConfiguration: string
    remapperCount: number
  }
}

// Remap pass events
export interface RemapPlanCreatedEvent extends BaseEvent {
  type: 'remap_plan_created'
  level: 'info'
  data: {
    projectName: string
    actionCount: number
  }
}

export interface DependencyRemappedEvent extends BaseEvent {
  type: 'dependency_remapped'
  level: 'info'
  data: {
    projectName: string
    targetConfiguration: string
    original: string
    remapped: string
  }
}

export interface RemapAppliedEvent extends BaseEvent {
  type: 'remap_applied'
  level: 'info'
  data: {
    projectName: string
    actionCount: number
  }
}

export interface RegistryClearedEvent extends BaseEvent {
  type: 'registry_cleared'
  level: 'debug'
  data: {
    projectName: string
    recordCount: number
  }
}

// POM artifact events
export interface PomArtifactAttachedEvent extends BaseEvent {
  type: 'pom_artifact_attached'
  level: 'debug'
  data: {
    dependency: string
    artifactName: string
  }
}

// Host logger sink
export interface HostLogEvent extends BaseEvent {
  type: 'host_log'
  data: {
    projectName: string
    message: string
  }
}

// Process-level events
export interface UnhandledRejectionEvent extends BaseEvent {
  type: 'unhandled_rejection'
  level: 'error'
  data: {
    reason: unknown
  }
}

export interface UncaughtExceptionEvent extends BaseEvent {
  type: 'uncaught_exception'
  level: 'error'
  data: {
    error: unknown
  }
}

export interface CLIErrorEvent extends BaseEvent {
  type: 'cli_error'
  level: 'error'
  data: {
    message: string
  }
}

export type DeobfEvent =
  | ProjectLoadingStartedEvent
  | ProjectLoadedEvent
  | DeobfConfigurationRegisteredEvent
  | DuplicateTrackingIgnoredEvent
  | MultipleRemappersWarningEvent
  | RemapPlanCreatedEvent
  | DependencyRemappedEvent
  | RemapAppliedEvent
  | RegistryClearedEvent
  | PomArtifactAttachedEvent
  | HostLogEvent
  | UnhandledRejectionEvent
  | UncaughtExceptionEvent
  | CLIErrorEvent

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

/** An event as handed to the emitter, before the timestamp is stamped on. */
export type DeobfEventInput = DistributiveOmit<DeobfEvent, 'timestamp'>

export type DeobfEventType = DeobfEvent['type']
