/**
 * VM Package Exports
 *
 * Decoder and execution engine for the MIPS instruction subset
 */

// Logger
export { logger } from '@mipsim/core'
// Re-export types from centralized types package
export * from '@mipsim/types'
// Configuration constants
export {
  DEFAULTS,
  FUNCT_CODES,
  INSTRUCTION_CONFIG,
  OPCODES,
  REGISTER_CONFIG,
  loadSimulatorConfig,
} from './config'
export type { SimulatorConfig } from './config'
// Decoder
export { decode, decodeProgram, formatDecoded, signExtend16 } from './decoder'
export type {
  AnyInstructionHandler,
  InstructionHandler,
} from './instructions/base'
export { InstructionRegistry } from './instructions/registry'
// Execution engine
export { Machine } from './machine'
export type { MachineOptions } from './machine'
export { MachineRAM } from './ram'
// Text input
export { parseBaseAddress, parseProgram, parseWord } from './parser'
// Session
export { Simulator } from './simulator'
export type { SimulatorOptions } from './simulator'
