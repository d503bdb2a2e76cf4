/**
 * Instruction Set Types
 *
 * Decoded instruction shapes for the three supported encodings:
 * register (R), immediate (I) and jump (J).
 */

/** Mnemonics resolved from the function code of an R-format word */
export type RegisterMnemonic = 'add' | 'sub' | 'and' | 'or' | 'slt'

/** Mnemonics resolved from the opcode of an I-format word */
export type ImmediateMnemonic = 'addi' | 'lw' | 'sw' | 'beq' | 'bne'

/** Mnemonics resolved from the opcode of a J-format word */
export type JumpMnemonic = 'j'

// Fallbacks carry the raw code as two lower-case hex digits
export type UnknownRegisterMnemonic = `unknown_r(0x${string})`
export type UnknownImmediateMnemonic = `unknown_i(0x${string})`

export type InstructionFormat = 'R' | 'I' | 'J'

export interface RegisterInstruction {
  format: 'R'
  opcode: number
  rs: number
  rt: number
  rd: number
  shamt: number
  funct: number
  mnemonic: RegisterMnemonic | UnknownRegisterMnemonic
}

export interface ImmediateInstruction {
  format: 'I'
  opcode: number
  rs: number
  rt: number
  /** Sign-extended 16-bit immediate, in [-32768, 32767] */
  imm: number
  mnemonic: ImmediateMnemonic | UnknownImmediateMnemonic
}

export interface JumpInstruction {
  format: 'J'
  opcode: number
  /** Raw 26-bit address field */
  address: number
  mnemonic: JumpMnemonic
}

export type DecodedInstruction =
  | RegisterInstruction
  | ImmediateInstruction
  | JumpInstruction

/**
 * One row of the static decoding pass: the word and the pc it would occupy
 */
export interface DecodedProgramEntry {
  pc: number
  word: number
  decoded: DecodedInstruction
}

/**
 * Result of splitting program text into instruction words
 */
export interface ProgramText {
  words: number[]
  /** 1-based numbers of non-blank lines that did not parse */
  skippedLines: number[]
}
