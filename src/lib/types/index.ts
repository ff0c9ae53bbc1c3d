export * from './model'
export * from './errors'
export * from './events'
export * from './descriptor'
