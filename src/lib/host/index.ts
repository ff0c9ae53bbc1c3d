export * from './configuration'
export * from './dependency'
export * from './logger'
export * from './project'
export * from './source-set'
