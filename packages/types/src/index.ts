/**
 * Centralized Type Definitions
 *
 * Shared types for the decoder and the execution engine, plus the
 * `Safe` result tuples and error identifiers used at API boundaries.
 */

// Error identifiers
export * from './errors'
// Instruction set types
export * from './isa'
// Machine and step result types
export * from './machine'
// Safe result tuples
export * from './safe'
