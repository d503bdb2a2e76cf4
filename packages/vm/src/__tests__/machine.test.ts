/**
 * Execution Engine Tests
 * Fetch/step/run contract, termination and the register-zero invariant
 */

import { logger } from '@mipsim/core'
import type { StepResult } from '@mipsim/types'
import { beforeAll, describe, expect, it } from 'vitest'
import { InstructionRegistry } from '../instructions/registry'
import { Machine } from '../machine'
import { asm } from './program-helpers'

const BASE = 0x0040_0000

beforeAll(() => {
  logger.init()
})

function statuses(results: StepResult[]): string[] {
  return results.map((result) => result.status)
}

describe('Machine', () => {
  describe('initial state', () => {
    it('should start at the base address with cleared state', () => {
      const machine = new Machine([asm.addi(1, 0, 1)])

      expect(machine.getState()).toEqual({
        pc: BASE,
        baseAddress: BASE,
        stepCount: 0,
        halted: false,
        registers: new Array(32).fill(0),
        memory: [],
      })
    })

    it('should honour a custom base address', () => {
      const machine = new Machine([asm.addi(1, 0, 1)], { baseAddress: 0x1000 })
      expect(machine.pc).toBe(0x1000)
      expect(machine.step()).toMatchObject({ status: 'ok', pc: 0x1000 })
      expect(machine.pc).toBe(0x1004)
    })

    it('should copy the loaded words', () => {
      const words = [asm.addi(1, 0, 7)]
      const machine = new Machine(words)
      words[0] = asm.addi(1, 0, 9)

      machine.step()
      expect(machine.getRegisters()[1]).toBe(7)
    })
  })

  describe('step', () => {
    it('should report the fetched word, decoding and register snapshot', () => {
      const word = asm.addi(8, 0, 5)
      const machine = new Machine([word])

      const result = machine.step()

      expect(result).toEqual({
        status: 'ok',
        pc: BASE,
        word,
        decoded: {
          format: 'I',
          opcode: 0x08,
          rs: 0,
          rt: 8,
          imm: 5,
          mnemonic: 'addi',
        },
        step: 1,
        registers: [0, 0, 0, 0, 0, 0, 0, 0, 5, ...new Array(23).fill(0)],
      })
      expect(machine.pc).toBe(BASE + 4)
      expect(machine.stepCount).toBe(1)
    })

    it('should number ok steps consecutively', () => {
      const machine = new Machine([
        asm.addi(1, 0, 1),
        asm.addi(2, 0, 2),
        asm.addi(3, 0, 3),
      ])

      const steps = machine.run(3).map((result) =>
        result.status === 'ok' ? result.step : -1,
      )
      expect(steps).toEqual([1, 2, 3])
    })

    it('should take register snapshots by value', () => {
      const machine = new Machine([asm.addi(1, 0, 1), asm.addi(1, 0, 2)])

      const first = machine.step()
      machine.step()

      expect(first.status === 'ok' && first.registers[1]).toBe(1)
      expect(machine.getRegisters()[1]).toBe(2)
    })

    it('should discard writes to register 0', () => {
      const machine = new Machine([
        asm.addi(0, 0, 5),
        asm.addi(1, 0, 3),
        asm.add(0, 1, 1),
      ])

      const results = machine.run(3)

      for (const result of results) {
        expect(result.status === 'ok' && result.registers[0]).toBe(0)
      }
      expect(machine.getRegisters()[0]).toBe(0)
      expect(machine.getRegisters()[1]).toBe(3)
    })

    it('should advance past unknown immediate opcodes without effect', () => {
      const machine = new Machine([0xfc00_0000, asm.addi(1, 0, 1)])

      const result = machine.step()

      expect(result).toMatchObject({
        status: 'ok',
        decoded: { mnemonic: 'unknown_i(0x3f)' },
        step: 1,
      })
      expect(machine.pc).toBe(BASE + 4)
      expect(machine.getRegisters()).toEqual(new Array(32).fill(0))
    })

    it('should advance past unknown function codes without effect', () => {
      const machine = new Machine([0x0022_183f])

      expect(machine.step()).toMatchObject({
        status: 'ok',
        decoded: { mnemonic: 'unknown_r(0x3f)' },
      })
      expect(machine.pc).toBe(BASE + 4)
      expect(machine.getRegisters()[3]).toBe(0)
    })
  })

  describe('termination', () => {
    it('should run L ok steps then stop at pc out of range', () => {
      const program = [asm.addi(1, 0, 1), asm.addi(2, 0, 2), asm.add(3, 1, 2)]
      const machine = new Machine(program)

      const results = machine.run(program.length + 5)

      expect(statuses(results)).toEqual(['ok', 'ok', 'ok', 'pc_out_of_range'])
      expect(results[3]).toEqual({
        status: 'pc_out_of_range',
        pc: BASE + 12,
      })
      expect(machine.halted).toBe(true)
      expect(machine.stepCount).toBe(3)
      expect(machine.getRegisters()[3]).toBe(3)
    })

    it('should halt immediately on an empty program', () => {
      const machine = new Machine([])
      expect(machine.run(10)).toEqual([{ status: 'pc_out_of_range', pc: BASE }])
    })

    it('should detect a pc below the base at the next fetch', () => {
      const machine = new Machine([asm.beq(0, 0, -2)])

      expect(machine.step()).toMatchObject({ status: 'ok' })
      expect(machine.pc).toBe(BASE - 4)
      expect(machine.step()).toEqual({
        status: 'pc_out_of_range',
        pc: BASE - 4,
      })
    })

    it('should be idempotent once halted', () => {
      const machine = new Machine([asm.addi(1, 0, 1), asm.sw(1, 0, 0)])
      machine.run(10)
      const before = machine.getState()

      expect(machine.step()).toEqual({ status: 'halted' })
      expect(machine.step()).toEqual({ status: 'halted' })
      expect(machine.run(5)).toEqual([])
      expect(machine.getState()).toEqual(before)
    })

    it('should stop an endless loop at the step budget', () => {
      // j to its own address
      const machine = new Machine([asm.j(BASE >>> 2)])

      const results = machine.run(5)

      expect(statuses(results)).toEqual(['ok', 'ok', 'ok', 'ok', 'ok'])
      expect(machine.pc).toBe(BASE)
      expect(machine.halted).toBe(false)
      expect(machine.stepCount).toBe(5)
    })

    it('should return nothing for a zero budget', () => {
      const machine = new Machine([asm.addi(1, 0, 1)])
      expect(machine.run(0)).toEqual([])
      expect(machine.stepCount).toBe(0)
    })
  })

  describe('with a custom registry', () => {
    it('should halt on a jump with no handler', () => {
      const registry = new InstructionRegistry()
      registry.clear()
      const machine = new Machine([asm.j(0x10)], { registry })

      expect(machine.step()).toEqual({
        status: 'unknown_jump',
        decoded: { format: 'J', opcode: 0x02, address: 0x10, mnemonic: 'j' },
      })
      expect(machine.halted).toBe(true)
      expect(machine.pc).toBe(BASE)
      expect(machine.stepCount).toBe(0)
      expect(machine.step()).toEqual({ status: 'halted' })
    })

    it('should dispatch to a handler registered into a cleared registry', () => {
      const registry = new InstructionRegistry()
      registry.clear()
      registry.register({
        format: 'R',
        mnemonic: 'add',
        code: 0x20,
        description: 'Write a marker value to rd',
        execute(context) {
          context.registers[context.instruction.rd] = 77
          return {}
        },
      })
      const machine = new Machine([asm.add(5, 1, 2), asm.sub(6, 1, 2)], {
        registry,
      })

      expect(statuses(machine.run(3))).toEqual(['ok', 'ok', 'pc_out_of_range'])
      expect(machine.getRegisters()[5]).toBe(77)
      expect(machine.getRegisters()[6]).toBe(0)
    })

    it('should treat unregistered register and immediate instructions as no-ops', () => {
      const registry = new InstructionRegistry()
      registry.clear()
      const machine = new Machine([asm.addi(1, 0, 4), asm.add(2, 1, 1)], {
        registry,
      })

      expect(statuses(machine.run(3))).toEqual(['ok', 'ok', 'pc_out_of_range'])
      expect(machine.getRegisters()).toEqual(new Array(32).fill(0))
    })
  })
})
