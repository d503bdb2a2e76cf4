/**
 * Simulator Configuration Constants
 *
 * Encoding tables, field layout and defaults for the MIPS-subset machine,
 * plus loading of the simulator's environment variables.
 */

import { createEnvSchema, loadEnvVariables, z } from '@mipsim/core'
import type { EnvLoadOptions } from '@mipsim/core'
import type {
  ImmediateMnemonic,
  JumpMnemonic,
  RegisterMnemonic,
  Safe,
} from '@mipsim/types'
import { CONFIG_ERRORS, safeError, safeResult } from '@mipsim/types'
import * as _ from 'radash'
import { parseBaseAddress } from './parser'

// Defaults
export const DEFAULTS = {
  BASE_PC: 0x0040_0000, // conventional program load address
  RUN_UNTIL_END_STEPS: 10_000, // budget of "run until end"
} as const

// Register configuration
export const REGISTER_CONFIG = {
  COUNT: 32,
  ZERO: 0, // hard-wired to zero
} as const

// Instruction word layout
export const INSTRUCTION_CONFIG = {
  WORD_BYTES: 4,
  OPCODE_SHIFT: 26,
  RS_SHIFT: 21,
  RT_SHIFT: 16,
  RD_SHIFT: 11,
  SHAMT_SHIFT: 6,
  OPCODE_MASK: 0x3f,
  REGISTER_MASK: 0x1f,
  SHAMT_MASK: 0x1f,
  FUNCT_MASK: 0x3f,
  IMMEDIATE_MASK: 0xffff,
  IMMEDIATE_SIGN_BIT: 0x8000,
  IMMEDIATE_RANGE: 0x1_0000,
  ADDRESS_MASK: 0x03ff_ffff,
} as const

// Jump target composition: upper pc bits kept, field shifted into the rest
export const JUMP_CONFIG = {
  PC_REGION_MASK: 0xf000_0000,
  TARGET_MASK: 0x0fff_ffff,
  ADDRESS_SHIFT: 2,
} as const

// R-format function codes (opcode 0)
export const FUNCT_CODES = {
  ADD: 0x20,
  SUB: 0x22,
  AND: 0x24,
  OR: 0x25,
  SLT: 0x2a,
} as const

// Opcodes
export const OPCODES = {
  SPECIAL: 0x00, // R-format
  J: 0x02,
  BEQ: 0x04,
  BNE: 0x05,
  ADDI: 0x08,
  LW: 0x23,
  SW: 0x2b,
} as const

export const REGISTER_MNEMONICS: ReadonlyMap<number, RegisterMnemonic> =
  new Map([
    [FUNCT_CODES.ADD, 'add'],
    [FUNCT_CODES.SUB, 'sub'],
    [FUNCT_CODES.AND, 'and'],
    [FUNCT_CODES.OR, 'or'],
    [FUNCT_CODES.SLT, 'slt'],
  ])

export const IMMEDIATE_MNEMONICS: ReadonlyMap<number, ImmediateMnemonic> =
  new Map([
    [OPCODES.ADDI, 'addi'],
    [OPCODES.LW, 'lw'],
    [OPCODES.SW, 'sw'],
    [OPCODES.BEQ, 'beq'],
    [OPCODES.BNE, 'bne'],
  ])

// Opcodes decoded as J-format; every other non-zero opcode is I-format
export const JUMP_MNEMONICS: ReadonlyMap<number, JumpMnemonic> = new Map([
  [OPCODES.J, 'j'],
])

export const simulatorEnvSchema = createEnvSchema({
  SIM_BASE_PC: z.string().optional(),
  SIM_RUN_UNTIL_END_STEPS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULTS.RUN_UNTIL_END_STEPS),
})

export type SimulatorEnv = z.infer<typeof simulatorEnvSchema>

export interface SimulatorConfig {
  baseAddress: number
  runUntilEndSteps: number
}

/**
 * Read the simulator settings from the environment
 *
 * `SIM_BASE_PC` takes hex (`0x` prefix) or decimal; unset means the default
 * load address.
 */
export function loadSimulatorConfig(
  options: EnvLoadOptions = {},
): Safe<SimulatorConfig> {
  const [envError, env] = _.try(() =>
    loadEnvVariables(simulatorEnvSchema, options),
  )()
  if (envError) {
    return safeError(
      new Error(`${CONFIG_ERRORS.INVALID_ENVIRONMENT}: ${envError.message}`),
    )
  }

  if (env.SIM_BASE_PC === undefined) {
    return safeResult({
      baseAddress: DEFAULTS.BASE_PC,
      runUntilEndSteps: env.SIM_RUN_UNTIL_END_STEPS,
    })
  }

  const [baseError, baseAddress] = parseBaseAddress(env.SIM_BASE_PC)
  if (baseError) {
    return safeError(
      new Error(`${CONFIG_ERRORS.INVALID_BASE_ADDRESS}: ${env.SIM_BASE_PC}`),
    )
  }

  return safeResult({
    baseAddress,
    runUntilEndSteps: env.SIM_RUN_UNTIL_END_STEPS,
  })
}
