/**
 * Instruction Registry
 *
 * Maps each format's mnemonics to their handlers. The machine consults it
 * after decoding; a missing handler means the instruction has no effect
 * (R, I) or halts the machine (J).
 */

import { ADDIInstruction, ADDInstruction, SUBInstruction } from './arithmetic'
import type {
  AnyInstructionHandler,
  ImmediateInstructionHandler,
  JumpInstructionHandler,
  RegisterInstructionHandler,
} from './base'
import { ANDInstruction, ORInstruction } from './bitwise'
import { BEQInstruction, BNEInstruction } from './branching'
import { SLTInstruction } from './comparison'
import { JInstruction } from './control-flow'
import { LWInstruction, SWInstruction } from './memory'

export class InstructionRegistry {
  private readonly registerHandlers: Map<string, RegisterInstructionHandler> =
    new Map()
  private readonly immediateHandlers: Map<
    string,
    ImmediateInstructionHandler
  > = new Map()
  private readonly jumpHandlers: Map<string, JumpInstructionHandler> =
    new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Register all instruction handlers
   */
  private registerInstructions(): void {
    // Register-format ALU instructions
    this.register(new ADDInstruction())
    this.register(new SUBInstruction())
    this.register(new ANDInstruction())
    this.register(new ORInstruction())
    this.register(new SLTInstruction())

    // Immediate arithmetic
    this.register(new ADDIInstruction())

    // Memory instructions
    this.register(new LWInstruction())
    this.register(new SWInstruction())

    // Branching instructions
    this.register(new BEQInstruction())
    this.register(new BNEInstruction())

    // Control flow instructions
    this.register(new JInstruction())
  }

  /**
   * Register an instruction handler, replacing any with the same mnemonic
   */
  register(handler: AnyInstructionHandler): void {
    switch (handler.format) {
      case 'R':
        this.registerHandlers.set(handler.mnemonic, handler)
        break
      case 'I':
        this.immediateHandlers.set(handler.mnemonic, handler)
        break
      case 'J':
        this.jumpHandlers.set(handler.mnemonic, handler)
        break
    }
  }

  getRegisterHandler(mnemonic: string): RegisterInstructionHandler | undefined {
    return this.registerHandlers.get(mnemonic)
  }

  getImmediateHandler(
    mnemonic: string,
  ): ImmediateInstructionHandler | undefined {
    return this.immediateHandlers.get(mnemonic)
  }

  getJumpHandler(mnemonic: string): JumpInstructionHandler | undefined {
    return this.jumpHandlers.get(mnemonic)
  }

  /**
   * Clear all handlers (for testing)
   */
  clear(): void {
    this.registerHandlers.clear()
    this.immediateHandlers.clear()
    this.jumpHandlers.clear()
  }
}
