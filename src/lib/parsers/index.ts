export * from './dependency'
export * from './descriptor'
