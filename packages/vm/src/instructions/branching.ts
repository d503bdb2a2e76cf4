/**
 * Branching Instructions
 *
 * Taken branches set the next pc to pc + 4 + imm * 4; otherwise the
 * machine advances by one word.
 */

import { logger } from '@mipsim/core'
import type {
  ImmediateInstructionContext,
  InstructionResult,
} from '@mipsim/types'
import { OPCODES } from '../config'
import { ImmediateFormatInstruction } from './base'

/**
 * Shared operand handling for the two-register branches
 */
abstract class RegisterCompareBranch extends ImmediateFormatInstruction {
  protected abstract shouldBranch(valueS: number, valueT: number): boolean

  execute(context: ImmediateInstructionContext): InstructionResult {
    const { rs, rt, imm } = context.instruction
    const valueS = this.getRegisterValue(context.registers, rs)
    const valueT = this.getRegisterValue(context.registers, rt)

    if (this.shouldBranch(valueS, valueT)) {
      context.nextPc = this.getBranchTarget(context)
      logger.debug(`${this.mnemonic}: branch taken`, {
        pc: context.pc,
        imm,
        target: context.nextPc,
      })
    }

    return {}
  }
}

/**
 * BEQ instruction (opcode 0x04)
 * Branch if rs == rt
 */
export class BEQInstruction extends RegisterCompareBranch {
  readonly mnemonic = 'beq' as const
  readonly code = OPCODES.BEQ
  readonly description = 'Branch if registers are equal'

  protected shouldBranch(valueS: number, valueT: number): boolean {
    return valueS === valueT
  }
}

/**
 * BNE instruction (opcode 0x05)
 * Branch if rs != rt
 */
export class BNEInstruction extends RegisterCompareBranch {
  readonly mnemonic = 'bne' as const
  readonly code = OPCODES.BNE
  readonly description = 'Branch if registers differ'

  protected shouldBranch(valueS: number, valueT: number): boolean {
    return valueS !== valueT
  }
}
