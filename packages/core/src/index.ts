// Core types - shared across all packages
export * from './types'

// Remote command channel interface - implemented by @zonekit/ssh
export * from './channel'

// Schemas for validation
export * from './schemas/driver-config'
export * from './schemas/run-state'

// Case conversion utilities (snake_case ↔ camelCase)
export * from './case-convert'
