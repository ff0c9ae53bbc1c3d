// Types
export * from './types'

// Deobfuscation configuration management
export * from './deobf'

// Remapping
export * from './remapping'

// In-memory host
export * from './host'

// Project loading
export * from './core/loader'

// Events
export * from './events'

// Parsers
export * as parsers from './parsers'
