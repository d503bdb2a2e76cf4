/**
 * Bitwise Instructions
 */

import { FUNCT_CODES } from '../config'
import { RegisterALUInstruction } from './base'

/**
 * AND instruction (funct 0x24)
 */
export class ANDInstruction extends RegisterALUInstruction {
  readonly mnemonic = 'and' as const
  readonly code = FUNCT_CODES.AND
  readonly description = 'Bitwise AND of registers'

  protected compute(valueS: number, valueT: number): number {
    return valueS & valueT
  }
}

/**
 * OR instruction (funct 0x25)
 */
export class ORInstruction extends RegisterALUInstruction {
  readonly mnemonic = 'or' as const
  readonly code = FUNCT_CODES.OR
  readonly description = 'Bitwise OR of registers'

  protected compute(valueS: number, valueT: number): number {
    return valueS | valueT
  }
}
