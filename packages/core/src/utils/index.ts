/**
 * Utility exports for the core package
 */

// Encoding utilities
export * from './encoding'
