/**
 * Control Flow Instructions
 */

import { logger } from '@mipsim/core'
import type { InstructionResult, JumpInstructionContext } from '@mipsim/types'
import { JUMP_CONFIG, OPCODES } from '../config'
import { JumpFormatInstruction } from './base'

/**
 * J instruction (opcode 0x02)
 * pc = (pc & 0xF0000000) | ((address << 2) & 0x0FFFFFFF)
 */
export class JInstruction extends JumpFormatInstruction {
  readonly mnemonic = 'j' as const
  readonly code = OPCODES.J
  readonly description = 'Jump within the current 256 MiB region'

  execute(context: JumpInstructionContext): InstructionResult {
    const { address } = context.instruction
    const target =
      ((context.pc & JUMP_CONFIG.PC_REGION_MASK) |
        ((address << JUMP_CONFIG.ADDRESS_SHIFT) & JUMP_CONFIG.TARGET_MASK)) >>>
      0

    logger.debug('Executing j instruction', { pc: context.pc, address, target })

    context.nextPc = target
    return {}
  }
}
