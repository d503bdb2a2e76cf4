/**
 * Memory Instructions
 *
 * LW and SW address memory at rs + sext(imm). Addresses are byte addresses
 * into the sparse word store; alignment is not checked.
 */

import { logger, toHex } from '@mipsim/core'
import type {
  ImmediateInstructionContext,
  InstructionResult,
} from '@mipsim/types'
import { OPCODES } from '../config'
import { ImmediateFormatInstruction } from './base'

/**
 * LW instruction (opcode 0x23)
 * rt = mem[rs + imm], 0 when the address was never written
 */
export class LWInstruction extends ImmediateFormatInstruction {
  readonly mnemonic = 'lw' as const
  readonly code = OPCODES.LW
  readonly description = 'Load word'

  execute(context: ImmediateInstructionContext): InstructionResult {
    const { rt } = context.instruction
    const address = this.getEffectiveAddress(context)
    const value = context.ram.read(address)

    logger.debug('Executing lw instruction', {
      rt,
      address: toHex(address, 8),
      value,
    })

    this.setRegisterValue(context.registers, rt, value)
    return { memoryAccess: { type: 'read', address, value } }
  }
}

/**
 * SW instruction (opcode 0x2B)
 * mem[rs + imm] = rt
 */
export class SWInstruction extends ImmediateFormatInstruction {
  readonly mnemonic = 'sw' as const
  readonly code = OPCODES.SW
  readonly description = 'Store word'

  execute(context: ImmediateInstructionContext): InstructionResult {
    const { rt } = context.instruction
    const address = this.getEffectiveAddress(context)
    const value = this.getRegisterValue(context.registers, rt) >>> 0

    logger.debug('Executing sw instruction', {
      rt,
      address: toHex(address, 8),
      value,
    })

    context.ram.write(address, value)
    return { memoryAccess: { type: 'write', address, value } }
  }
}
