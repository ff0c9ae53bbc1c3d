export * from './apply'
export * from './list'
export * from './plan'
