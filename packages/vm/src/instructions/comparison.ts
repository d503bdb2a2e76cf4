/**
 * Comparison Instructions
 */

import { FUNCT_CODES } from '../config'
import { RegisterALUInstruction } from './base'

/**
 * SLT instruction (funct 0x2A)
 * rd = 1 if rs < rt, else 0. Both operands compare as unsigned 32-bit values.
 */
export class SLTInstruction extends RegisterALUInstruction {
  readonly mnemonic = 'slt' as const
  readonly code = FUNCT_CODES.SLT
  readonly description = 'Set on less than (unsigned compare)'

  protected compute(valueS: number, valueT: number): number {
    return valueS < valueT ? 1 : 0
  }
}
