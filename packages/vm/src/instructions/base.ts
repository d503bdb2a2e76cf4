/**
 * Base Instruction System
 *
 * Defines the handler interface and the abstract classes the concrete
 * instructions extend, one per encoding format.
 */

import { logger } from '@mipsim/core'
import type {
  DecodedInstruction,
  ImmediateInstruction,
  ImmediateMnemonic,
  InstructionContext,
  InstructionResult,
  JumpInstruction,
  JumpMnemonic,
  RegisterFile,
  RegisterInstruction,
  RegisterMnemonic,
} from '@mipsim/types'
import { INSTRUCTION_CONFIG } from '../config'

/**
 * Base interface for all instruction handlers
 */
export interface InstructionHandler<T extends DecodedInstruction> {
  readonly format: T['format']
  readonly mnemonic: string
  /** Function code for R-format handlers, opcode otherwise */
  readonly code: number
  readonly description: string

  /**
   * Execute the instruction (mutates context in place)
   * @returns side effects to report in the step record
   */
  execute(context: InstructionContext<T>): InstructionResult
}

export type RegisterInstructionHandler = InstructionHandler<RegisterInstruction>
export type ImmediateInstructionHandler =
  InstructionHandler<ImmediateInstruction>
export type JumpInstructionHandler = InstructionHandler<JumpInstruction>

export type AnyInstructionHandler =
  | RegisterInstructionHandler
  | ImmediateInstructionHandler
  | JumpInstructionHandler

/**
 * Abstract base class for instructions
 * Register access helpers shared by every format
 */
export abstract class BaseInstruction<T extends DecodedInstruction>
  implements InstructionHandler<T>
{
  abstract readonly format: T['format']
  abstract readonly mnemonic: string
  abstract readonly code: number
  abstract readonly description: string

  abstract execute(context: InstructionContext<T>): InstructionResult

  protected getRegisterValue(registers: RegisterFile, index: number): number {
    return registers[index]
  }

  /**
   * Write a register modulo 2^32
   * Writes to register 0 land here too; the machine clears it after the step.
   */
  protected setRegisterValue(
    registers: RegisterFile,
    index: number,
    value: number,
  ): void {
    registers[index] = value >>> 0
  }
}

/**
 * R-format ALU instruction: rd = compute(rs, rt)
 */
export abstract class RegisterALUInstruction extends BaseInstruction<RegisterInstruction> {
  readonly format = 'R' as const
  abstract readonly mnemonic: RegisterMnemonic

  /** Combine the two unsigned source values; the result is masked to 32 bits */
  protected abstract compute(valueS: number, valueT: number): number

  execute(context: InstructionContext<RegisterInstruction>): InstructionResult {
    const { rs, rt, rd } = context.instruction
    const valueS = this.getRegisterValue(context.registers, rs)
    const valueT = this.getRegisterValue(context.registers, rt)
    const result = this.compute(valueS, valueT) >>> 0

    logger.debug(`Executing ${this.mnemonic} instruction`, {
      rs,
      rt,
      rd,
      valueS,
      valueT,
      result,
    })

    this.setRegisterValue(context.registers, rd, result)
    return {}
  }
}

/**
 * I-format instruction
 */
export abstract class ImmediateFormatInstruction extends BaseInstruction<ImmediateInstruction> {
  readonly format = 'I' as const
  abstract readonly mnemonic: ImmediateMnemonic

  /**
   * Byte address rs + imm, as an unsigned 32-bit sum
   */
  protected getEffectiveAddress(
    context: InstructionContext<ImmediateInstruction>,
  ): number {
    const { rs, imm } = context.instruction
    return (this.getRegisterValue(context.registers, rs) + imm) >>> 0
  }

  /**
   * Target of a taken branch: pc + 4 + imm * 4
   */
  protected getBranchTarget(
    context: InstructionContext<ImmediateInstruction>,
  ): number {
    return (
      context.pc +
      INSTRUCTION_CONFIG.WORD_BYTES +
      context.instruction.imm * INSTRUCTION_CONFIG.WORD_BYTES
    )
  }
}

/**
 * J-format instruction
 */
export abstract class JumpFormatInstruction extends BaseInstruction<JumpInstruction> {
  readonly format = 'J' as const
  abstract readonly mnemonic: JumpMnemonic
}
