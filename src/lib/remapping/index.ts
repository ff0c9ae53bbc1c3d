export * from './remapper'
