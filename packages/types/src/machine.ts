/**
 * Machine Types
 *
 * Register file, memory, step results and snapshots for the execution engine.
 */

import type {
  DecodedInstruction,
  ImmediateInstruction,
  JumpInstruction,
  RegisterInstruction,
} from './isa'

/**
 * 32 unsigned 32-bit registers; index 0 is forced to zero after every step
 */
export type RegisterFile = Uint32Array

export type MemoryAccessType = 'read' | 'write'

/**
 * Memory side effect of a load or store
 */
export interface MemoryAccess {
  type: MemoryAccessType
  address: number
  value: number
}

export interface MemoryEntry {
  address: number
  value: number
}

/**
 * Sparse byte-addressed word memory
 * Unwritten addresses read as zero; no alignment is enforced.
 */
export interface RAM {
  /** Read the word stored at a byte address (0 when never written) */
  read(address: number): number

  /** Store a word at a byte address, masked to 32 bits */
  write(address: number, value: number): void

  /** Non-zero words ordered by address, as copies */
  entries(): MemoryEntry[]
}

// Step status codes
export const STEP_STATUS = {
  OK: 'ok',
  HALTED: 'halted',
  PC_OUT_OF_RANGE: 'pc_out_of_range',
  UNKNOWN_JUMP: 'unknown_jump',
  UNKNOWN_TYPE: 'unknown_type',
} as const

export type StepStatus = (typeof STEP_STATUS)[keyof typeof STEP_STATUS]

export interface OkStep {
  status: typeof STEP_STATUS.OK
  /** pc the instruction was fetched from */
  pc: number
  word: number
  decoded: DecodedInstruction
  /** Step counter after this step */
  step: number
  memoryAccess?: MemoryAccess
  /** Register file copy taken after the step */
  registers: number[]
}

export interface HaltedStep {
  status: typeof STEP_STATUS.HALTED
}

export interface PcOutOfRangeStep {
  status: typeof STEP_STATUS.PC_OUT_OF_RANGE
  pc: number
}

export interface UnknownJumpStep {
  status: typeof STEP_STATUS.UNKNOWN_JUMP
  decoded: JumpInstruction
}

export interface UnknownTypeStep {
  status: typeof STEP_STATUS.UNKNOWN_TYPE
  decoded: DecodedInstruction
}

export type StepResult =
  | OkStep
  | HaltedStep
  | PcOutOfRangeStep
  | UnknownJumpStep
  | UnknownTypeStep

/**
 * Point-in-time copy of everything observable on a machine
 */
export interface MachineSnapshot {
  pc: number
  baseAddress: number
  stepCount: number
  halted: boolean
  registers: number[]
  memory: MemoryEntry[]
}

/**
 * Instruction execution context (mutable)
 * Handlers write registers and memory in place and set `nextPc` to branch.
 */
export interface InstructionContext<
  T extends DecodedInstruction = DecodedInstruction,
> {
  instruction: T
  registers: RegisterFile
  ram: RAM
  /** pc of the instruction being executed */
  pc: number
  /** pc of the next fetch, preset to pc + 4 */
  nextPc: number
}

export interface InstructionResult {
  memoryAccess?: MemoryAccess
}

export type RegisterInstructionContext = InstructionContext<RegisterInstruction>
export type ImmediateInstructionContext =
  InstructionContext<ImmediateInstruction>
export type JumpInstructionContext = InstructionContext<JumpInstruction>
