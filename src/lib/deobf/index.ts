export * from './constants'
export * from './manager'
export * from './marker'
export * from './pom'
