/**
 * Word Parser
 *
 * Turns lines of program text into unsigned 32-bit instruction words.
 * Accepted encodings, in order: `0x`-prefixed hex, 32-character binary,
 * bare hex.
 */

import { isWord, logger } from '@mipsim/core'
import type { ProgramText, Safe } from '@mipsim/types'
import { LOAD_ERRORS, safeError, safeResult } from '@mipsim/types'

const HEX_PREFIX = /^0x/i
const HEX_DIGITS = /^[0-9a-f]+$/i
const DECIMAL_DIGITS = /^[0-9]+$/
const BINARY_WORD = /^[01]{32}$/

function parseHexDigits(digits: string): number | undefined {
  if (!HEX_DIGITS.test(digits)) {
    return undefined
  }
  const value = Number.parseInt(digits, 16)
  return isWord(value) ? value : undefined
}

/**
 * Parse one line into an instruction word
 *
 * @returns the word, or `undefined` for blank or unparseable text
 */
export function parseWord(line: string): number | undefined {
  const text = line.trim()
  if (text.length === 0) {
    return undefined
  }

  if (HEX_PREFIX.test(text)) {
    return parseHexDigits(text.slice(2))
  }

  if (BINARY_WORD.test(text)) {
    return Number.parseInt(text, 2)
  }

  return parseHexDigits(text)
}

/**
 * Parse program text, one word per line
 * Lines that do not parse are skipped and reported by line number.
 */
export function parseProgram(text: string): ProgramText {
  const words: number[] = []
  const skippedLines: number[] = []

  text.split(/\r\n|\r|\n/).forEach((line, index) => {
    const word = parseWord(line)
    if (word !== undefined) {
      words.push(word)
    } else if (line.trim().length > 0) {
      skippedLines.push(index + 1)
    }
  })

  if (skippedLines.length > 0) {
    logger.debug('Skipped unparseable program lines', { skippedLines })
  }

  return { words, skippedLines }
}

/**
 * Parse a base address entry: hex with a `0x` prefix, decimal otherwise
 */
export function parseBaseAddress(text: string): Safe<number> {
  const trimmed = text.trim()
  const value = HEX_PREFIX.test(trimmed)
    ? parseHexDigits(trimmed.slice(2))
    : DECIMAL_DIGITS.test(trimmed)
      ? Number.parseInt(trimmed, 10)
      : undefined

  if (value === undefined || !isWord(value)) {
    return safeError(
      new Error(`${LOAD_ERRORS.INVALID_BASE_ADDRESS}: ${JSON.stringify(text)}`),
    )
  }

  return safeResult(value)
}
