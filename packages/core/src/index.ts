/**
 * Core Package
 *
 * Logging, environment configuration and formatting helpers shared by the
 * simulator packages.
 */

// Export environment loading
export * from './env'
// Export logger
export * from './logger'
// Export all utilities
export * from './utils'
// Export Zod
export * from './zod'
