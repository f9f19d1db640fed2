// Core types - shared across all packages
export * from './types'

// Container runtime interface - implemented by @labelsync/docker
export * from './runtime'

// Runtime errors shared by adapters and the API
export * from './errors'

// Restart label resolution
export * from './labels'

// Outcome helpers
export * from './outcome'

// Schemas for validation
export * from './schemas/repository'
export * from './schemas/webhook'

// Utilities
export * from './duration'
export * from './repository-url'
