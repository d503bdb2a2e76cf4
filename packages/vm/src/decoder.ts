/**
 * Instruction Decoder
 *
 * Classifies a 32-bit word as R, I or J format and extracts its fields.
 * Decoding is total: unrecognized codes get an `unknown_*` mnemonic.
 */

import { registerName, toHex } from '@mipsim/core'
import type {
  DecodedInstruction,
  DecodedProgramEntry,
  ImmediateInstruction,
  JumpInstruction,
  RegisterInstruction,
} from '@mipsim/types'
import {
  DEFAULTS,
  IMMEDIATE_MNEMONICS,
  INSTRUCTION_CONFIG,
  JUMP_MNEMONICS,
  OPCODES,
  REGISTER_MNEMONICS,
} from './config'

const {
  OPCODE_SHIFT,
  RS_SHIFT,
  RT_SHIFT,
  RD_SHIFT,
  SHAMT_SHIFT,
  OPCODE_MASK,
  REGISTER_MASK,
  SHAMT_MASK,
  FUNCT_MASK,
  IMMEDIATE_MASK,
  IMMEDIATE_SIGN_BIT,
  IMMEDIATE_RANGE,
  ADDRESS_MASK,
  WORD_BYTES,
} = INSTRUCTION_CONFIG

/**
 * Sign-extend a 16-bit two's-complement field
 */
export function signExtend16(value: number): number {
  const field = value & IMMEDIATE_MASK
  return field & IMMEDIATE_SIGN_BIT ? field - IMMEDIATE_RANGE : field
}

function codeDigits(code: number): string {
  return code.toString(16).padStart(2, '0')
}

/**
 * Decode one instruction word
 */
export function decode(word: number): DecodedInstruction {
  const instr = word >>> 0
  const opcode = (instr >>> OPCODE_SHIFT) & OPCODE_MASK
  const rs = (instr >>> RS_SHIFT) & REGISTER_MASK
  const rt = (instr >>> RT_SHIFT) & REGISTER_MASK

  if (opcode === OPCODES.SPECIAL) {
    const funct = instr & FUNCT_MASK
    const decoded: RegisterInstruction = {
      format: 'R',
      opcode,
      rs,
      rt,
      rd: (instr >>> RD_SHIFT) & REGISTER_MASK,
      shamt: (instr >>> SHAMT_SHIFT) & SHAMT_MASK,
      funct,
      mnemonic:
        REGISTER_MNEMONICS.get(funct) ?? `unknown_r(0x${codeDigits(funct)})`,
    }
    return decoded
  }

  const jumpMnemonic = JUMP_MNEMONICS.get(opcode)
  if (jumpMnemonic !== undefined) {
    const decoded: JumpInstruction = {
      format: 'J',
      opcode,
      address: instr & ADDRESS_MASK,
      mnemonic: jumpMnemonic,
    }
    return decoded
  }

  const decoded: ImmediateInstruction = {
    format: 'I',
    opcode,
    rs,
    rt,
    imm: signExtend16(instr),
    mnemonic:
      IMMEDIATE_MNEMONICS.get(opcode) ?? `unknown_i(0x${codeDigits(opcode)})`,
  }
  return decoded
}

/**
 * Render a decoded instruction for listings and traces
 *
 * Registers print as `$n`, immediates and shift amounts in decimal,
 * function codes and jump fields in hex.
 */
export function formatDecoded(decoded: DecodedInstruction): string {
  switch (decoded.format) {
    case 'R':
      return `R-type: ${decoded.mnemonic} rs=${registerName(decoded.rs)} rt=${registerName(decoded.rt)} rd=${registerName(decoded.rd)} shamt=${decoded.shamt} funct=${toHex(decoded.funct, 2)}`
    case 'I':
      return `I-type: ${decoded.mnemonic} rs=${registerName(decoded.rs)} rt=${registerName(decoded.rt)} imm=${decoded.imm}`
    case 'J':
      return `J-type: ${decoded.mnemonic} addr=${toHex(decoded.address, 7)}`
  }
}

/**
 * Static decoding pass: every word with the pc it would be fetched from
 */
export function decodeProgram(
  words: readonly number[],
  baseAddress: number = DEFAULTS.BASE_PC,
): DecodedProgramEntry[] {
  return words.map((word, index) => ({
    pc: baseAddress + WORD_BYTES * index,
    word,
    decoded: decode(word),
  }))
}
