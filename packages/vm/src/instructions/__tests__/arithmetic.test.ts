/**
 * Arithmetic, Bitwise and Comparison Instruction Tests
 * ADD, SUB, ADDI, AND, OR and SLT, including 32-bit wraparound
 */

import { logger } from '@mipsim/core'
import type { ImmediateInstruction, RegisterInstruction } from '@mipsim/types'
import { beforeAll, describe, expect, it } from 'vitest'
import { decode } from '../../decoder'
import { Machine } from '../../machine'
import { asm } from '../../__tests__/program-helpers'
import { ADDIInstruction, ADDInstruction, SUBInstruction } from '../arithmetic'
import { ANDInstruction, ORInstruction } from '../bitwise'
import { SLTInstruction } from '../comparison'
import { createContext } from './context-helper'

beforeAll(() => {
  logger.init()
})

function registerWord(word: number): RegisterInstruction {
  const decoded = decode(word)
  if (decoded.format !== 'R') {
    throw new Error(`expected an R-format word, got ${decoded.format}`)
  }
  return decoded
}

function immediateWord(word: number): ImmediateInstruction {
  const decoded = decode(word)
  if (decoded.format !== 'I') {
    throw new Error(`expected an I-format word, got ${decoded.format}`)
  }
  return decoded
}

describe('Arithmetic Instructions', () => {
  it('should wrap add of 0xFFFFFFFF and 1 to zero', () => {
    const context = createContext(registerWord(asm.add(3, 1, 2)), {
      registers: { 1: 0xffff_ffff, 2: 1 },
    })

    expect(new ADDInstruction().execute(context)).toEqual({})
    expect(context.registers[3]).toBe(0)
    expect(context.nextPc).toBe(context.pc + 4)
  })

  it('should wrap sub below zero', () => {
    const context = createContext(registerWord(asm.sub(4, 2, 1)), {
      registers: { 1: 0xffff_ffff, 2: 1 },
    })

    new SUBInstruction().execute(context)
    expect(context.registers[4]).toBe(2)
  })

  it('should add a sign-extended immediate', () => {
    const context = createContext(immediateWord(asm.addi(2, 1, -5)), {
      registers: { 1: 3 },
    })

    new ADDIInstruction().execute(context)
    expect(context.registers[2]).toBe(0xffff_fffe)
  })

  it('should wrap addi past the top of the range', () => {
    const context = createContext(immediateWord(asm.addi(2, 1, 1)), {
      registers: { 1: 0xffff_ffff },
    })

    new ADDIInstruction().execute(context)
    expect(context.registers[2]).toBe(0)
  })

  it('should run a wraparound program end to end', () => {
    const machine = new Machine([
      asm.addi(1, 0, -1),
      asm.addi(2, 0, 1),
      asm.add(3, 1, 2),
      asm.sub(4, 2, 1),
    ])

    machine.run(4)

    const registers = machine.getRegisters()
    expect(registers[1]).toBe(0xffff_ffff)
    expect(registers[2]).toBe(1)
    expect(registers[3]).toBe(0)
    expect(registers[4]).toBe(2)
  })
})

describe('Bitwise Instructions', () => {
  it('should AND and OR as unsigned values', () => {
    const registers = { 1: 0xf0f0_f0f0, 2: 0xff00_ff00 }
    const andContext = createContext(registerWord(asm.and(3, 1, 2)), {
      registers,
    })
    const orContext = createContext(registerWord(asm.or(3, 1, 2)), {
      registers,
    })

    new ANDInstruction().execute(andContext)
    new ORInstruction().execute(orContext)

    expect(andContext.registers[3]).toBe(0xf000_f000)
    expect(orContext.registers[3]).toBe(0xfff0_fff0)
  })
})

describe('Comparison Instructions', () => {
  it('should compare as unsigned 32-bit values', () => {
    const registers = { 1: 0xffff_ffff, 2: 1 }
    const lower = createContext(registerWord(asm.slt(3, 2, 1)), { registers })
    const higher = createContext(registerWord(asm.slt(3, 1, 2)), { registers })
    const equal = createContext(registerWord(asm.slt(3, 2, 2)), { registers })

    new SLTInstruction().execute(lower)
    new SLTInstruction().execute(higher)
    new SLTInstruction().execute(equal)

    expect(lower.registers[3]).toBe(1)
    expect(higher.registers[3]).toBe(0)
    expect(equal.registers[3]).toBe(0)
  })
})
