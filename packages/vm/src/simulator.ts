/**
 * Simulator Session
 *
 * Holds one loaded program: its words, the static listing, the current
 * machine and the trace of every step taken since the last load or reset.
 */

import { MAX_WORD, logger, toHex, z } from '@mipsim/core'
import type { DecodedProgramEntry, Safe, StepResult } from '@mipsim/types'
import { LOAD_ERRORS, safeError, safeResult } from '@mipsim/types'
import { DEFAULTS } from './config'
import { decodeProgram } from './decoder'
import type { InstructionRegistry } from './instructions/registry'
import { Machine } from './machine'
import { parseProgram } from './parser'

const wordSchema = z.number().int().min(0).max(MAX_WORD)

export interface SimulatorOptions {
  /** pc of the first word; defaults to 0x00400000 */
  baseAddress?: number
  /** Step budget of `runUntilEnd()`; defaults to 10000 */
  runUntilEndSteps?: number
  /** Instruction handlers for every machine this session builds */
  registry?: InstructionRegistry
}

export class Simulator {
  readonly words: readonly number[]
  readonly baseAddress: number
  readonly runUntilEndSteps: number
  /** Static decoding of every loaded word */
  readonly listing: readonly DecodedProgramEntry[]
  private readonly registry?: InstructionRegistry
  private currentMachine: Machine
  private history: StepResult[] = []

  private constructor(
    words: readonly number[],
    baseAddress: number,
    runUntilEndSteps: number,
    registry?: InstructionRegistry,
  ) {
    this.words = [...words]
    this.baseAddress = baseAddress
    this.runUntilEndSteps = runUntilEndSteps
    this.registry = registry
    this.listing = decodeProgram(this.words, baseAddress)
    this.currentMachine = this.createMachine()
  }

  /**
   * Load a program from instruction words
   */
  static load(
    words: readonly number[],
    options: SimulatorOptions = {},
  ): Safe<Simulator> {
    const parsedWords = z.array(wordSchema).safeParse(words)
    if (!parsedWords.success) {
      const index = parsedWords.error.issues[0]?.path[0]
      return safeError(
        new Error(`${LOAD_ERRORS.INVALID_WORD}: index ${String(index)}`),
      )
    }

    const baseAddress = options.baseAddress ?? DEFAULTS.BASE_PC
    if (!wordSchema.safeParse(baseAddress).success) {
      return safeError(
        new Error(`${LOAD_ERRORS.INVALID_BASE_ADDRESS}: ${baseAddress}`),
      )
    }

    const runUntilEndSteps =
      options.runUntilEndSteps ?? DEFAULTS.RUN_UNTIL_END_STEPS
    if (!z.number().int().nonnegative().safeParse(runUntilEndSteps).success) {
      return safeError(
        new Error(`${LOAD_ERRORS.INVALID_STEP_BUDGET}: ${runUntilEndSteps}`),
      )
    }

    logger.debug('Simulator: program loaded', {
      words: parsedWords.data.length,
      baseAddress: toHex(baseAddress, 8),
    })

    return safeResult(
      new Simulator(
        parsedWords.data,
        baseAddress,
        runUntilEndSteps,
        options.registry,
      ),
    )
  }

  /**
   * Load a program from text, one word per line
   * Lines that do not parse as a word are skipped.
   */
  static fromText(
    text: string,
    options: SimulatorOptions = {},
  ): Safe<Simulator> {
    const { words } = parseProgram(text)
    return Simulator.load(words, options)
  }

  get machine(): Machine {
    return this.currentMachine
  }

  /** Every step result since the last load or reset */
  get trace(): StepResult[] {
    return [...this.history]
  }

  step(): StepResult {
    const result = this.currentMachine.step()
    this.history.push(result)
    return result
  }

  run(steps: number): StepResult[] {
    const results = this.currentMachine.run(steps)
    this.history.push(...results)
    return results
  }

  /**
   * Run with the session's fixed budget rather than until halted
   */
  runUntilEnd(): StepResult[] {
    return this.run(this.runUntilEndSteps)
  }

  /**
   * Discard the machine and the trace; start over from the same program
   */
  reset(): void {
    this.currentMachine = this.createMachine()
    this.history = []
  }

  private createMachine(): Machine {
    return new Machine(this.words, {
      baseAddress: this.baseAddress,
      registry: this.registry,
    })
  }
}
