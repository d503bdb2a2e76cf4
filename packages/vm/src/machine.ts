/**
 * Execution Engine
 *
 * Fetch-decode-execute loop over a fixed instruction memory. Every outcome,
 * including termination, is reported through the returned step result;
 * nothing here throws.
 */

import { formatWord, logger, toHex } from '@mipsim/core'
import type {
  DecodedInstruction,
  InstructionContext,
  InstructionResult,
  MachineSnapshot,
  MemoryEntry,
  OkStep,
  RAM,
  StepResult,
} from '@mipsim/types'
import { STEP_STATUS } from '@mipsim/types'
import { DEFAULTS, INSTRUCTION_CONFIG, REGISTER_CONFIG } from './config'
import { decode } from './decoder'
import { InstructionRegistry } from './instructions/registry'
import { MachineRAM } from './ram'

export interface MachineOptions {
  /** pc of the first instruction word */
  baseAddress?: number
  /** Handlers to dispatch to; defaults to every supported instruction */
  registry?: InstructionRegistry
}

/**
 * Simulated machine
 *
 * Owns registers, memory, pc, step counter and the halted flag. A machine
 * is built once per program load and replaced, not rewound, on reset.
 */
export class Machine {
  readonly baseAddress: number
  protected readonly registry: InstructionRegistry
  protected readonly instructions: readonly number[]
  protected readonly registers: Uint32Array = new Uint32Array(
    REGISTER_CONFIG.COUNT,
  )
  protected readonly ram: RAM = new MachineRAM()
  protected programCounter: number
  protected executedSteps = 0
  protected isHalted = false

  constructor(words: readonly number[], options: MachineOptions = {}) {
    this.baseAddress = options.baseAddress ?? DEFAULTS.BASE_PC
    this.registry = options.registry ?? new InstructionRegistry()
    this.instructions = [...words]
    this.programCounter = this.baseAddress
  }

  get pc(): number {
    return this.programCounter
  }

  get stepCount(): number {
    return this.executedSteps
  }

  get halted(): boolean {
    return this.isHalted
  }

  get programLength(): number {
    return this.instructions.length
  }

  getRegisters(): number[] {
    return Array.from(this.registers)
  }

  /**
   * Non-zero memory words ordered by address
   */
  getMemory(): MemoryEntry[] {
    return this.ram.entries()
  }

  getState(): MachineSnapshot {
    return {
      pc: this.programCounter,
      baseAddress: this.baseAddress,
      stepCount: this.executedSteps,
      halted: this.isHalted,
      registers: this.getRegisters(),
      memory: this.getMemory(),
    }
  }

  /**
   * Instruction word at `pc`, or undefined outside the loaded program
   */
  protected fetch(pc: number): number | undefined {
    const index = Math.floor(
      (pc - this.baseAddress) / INSTRUCTION_CONFIG.WORD_BYTES,
    )
    if (index < 0 || index >= this.instructions.length) {
      return undefined
    }
    return this.instructions[index]
  }

  /**
   * Execute a single instruction
   */
  step(): StepResult {
    if (this.isHalted) {
      return { status: STEP_STATUS.HALTED }
    }

    const pc = this.programCounter
    const word = this.fetch(pc)
    if (word === undefined) {
      this.isHalted = true
      logger.debug('Machine: pc out of range, halting', {
        pc: toHex(pc, 8),
        steps: this.executedSteps,
      })
      return { status: STEP_STATUS.PC_OUT_OF_RANGE, pc }
    }

    const decoded = decode(word)
    const context = {
      registers: this.registers,
      ram: this.ram,
      pc,
      nextPc: pc + INSTRUCTION_CONFIG.WORD_BYTES,
    }

    let result: InstructionResult = {}
    switch (decoded.format) {
      case 'R': {
        const handler = this.registry.getRegisterHandler(decoded.mnemonic)
        result = handler
          ? this.execute(handler, { ...context, instruction: decoded })
          : this.skip(context.nextPc)
        break
      }
      case 'I': {
        const handler = this.registry.getImmediateHandler(decoded.mnemonic)
        result = handler
          ? this.execute(handler, { ...context, instruction: decoded })
          : this.skip(context.nextPc)
        break
      }
      case 'J': {
        const handler = this.registry.getJumpHandler(decoded.mnemonic)
        if (!handler) {
          this.isHalted = true
          logger.warn('Machine: unknown jump instruction, halting', {
            pc: toHex(pc, 8),
            word: formatWord(word),
            mnemonic: decoded.mnemonic,
          })
          return { status: STEP_STATUS.UNKNOWN_JUMP, decoded }
        }
        result = this.execute(handler, { ...context, instruction: decoded })
        break
      }
      default: {
        const unreachable: never = decoded
        this.isHalted = true
        logger.warn('Machine: unknown instruction format, halting', {
          pc: toHex(pc, 8),
          word: formatWord(word),
        })
        return { status: STEP_STATUS.UNKNOWN_TYPE, decoded: unreachable }
      }
    }

    // Register 0 is hard-wired to zero
    this.registers[REGISTER_CONFIG.ZERO] = 0
    this.executedSteps++

    const okStep: OkStep = {
      status: STEP_STATUS.OK,
      pc,
      word,
      decoded,
      step: this.executedSteps,
      registers: this.getRegisters(),
    }
    if (result.memoryAccess) {
      okStep.memoryAccess = result.memoryAccess
    }
    return okStep
  }

  /**
   * Run up to `steps` instructions
   * Stops early once the machine halts; the halting step is included.
   */
  run(steps: number): StepResult[] {
    const results: StepResult[] = []
    for (let i = 0; i < steps; i++) {
      if (this.isHalted) {
        break
      }
      results.push(this.step())
    }
    return results
  }

  /**
   * Advance past an instruction that has no handler
   */
  private skip(nextPc: number): InstructionResult {
    this.programCounter = nextPc
    return {}
  }

  /**
   * Hand the context to a handler and commit the pc it leaves behind
   */
  private execute<T extends DecodedInstruction>(
    handler: { execute(context: InstructionContext<T>): InstructionResult },
    context: InstructionContext<T>,
  ): InstructionResult {
    const result = handler.execute(context)
    this.programCounter = context.nextPc
    return result
  }
}
