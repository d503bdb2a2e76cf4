/**
 * Arithmetic Instructions
 *
 * ADD, SUB (register) and ADDI (immediate), all modulo 2^32
 */

import { logger } from '@mipsim/core'
import type {
  ImmediateInstructionContext,
  InstructionResult,
} from '@mipsim/types'
import { FUNCT_CODES, OPCODES } from '../config'
import { ImmediateFormatInstruction, RegisterALUInstruction } from './base'

/**
 * ADD instruction (funct 0x20)
 * rd = (rs + rt) mod 2^32, no overflow trap
 */
export class ADDInstruction extends RegisterALUInstruction {
  readonly mnemonic = 'add' as const
  readonly code = FUNCT_CODES.ADD
  readonly description = 'Add registers'

  protected compute(valueS: number, valueT: number): number {
    return valueS + valueT
  }
}

/**
 * SUB instruction (funct 0x22)
 * rd = (rs - rt) mod 2^32
 */
export class SUBInstruction extends RegisterALUInstruction {
  readonly mnemonic = 'sub' as const
  readonly code = FUNCT_CODES.SUB
  readonly description = 'Subtract registers'

  protected compute(valueS: number, valueT: number): number {
    return valueS - valueT
  }
}

/**
 * ADDI instruction (opcode 0x08)
 * rt = (rs + sext(imm)) mod 2^32
 */
export class ADDIInstruction extends ImmediateFormatInstruction {
  readonly mnemonic = 'addi' as const
  readonly code = OPCODES.ADDI
  readonly description = 'Add sign-extended immediate'

  execute(context: ImmediateInstructionContext): InstructionResult {
    const { rs, rt, imm } = context.instruction
    const valueS = this.getRegisterValue(context.registers, rs)
    const result = (valueS + imm) >>> 0

    logger.debug('Executing addi instruction', { rs, rt, imm, valueS, result })

    this.setRegisterValue(context.registers, rt, result)
    return {}
  }
}
