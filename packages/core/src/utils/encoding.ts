/**
 * Encoding Utilities
 *
 * Hex rendering of machine words, addresses and register names
 */

/** Largest unsigned 32-bit value */
export const MAX_WORD = 0xffff_ffff

/**
 * Render a non-negative integer as `0x` followed by at least `width`
 * lower-case hex digits
 */
export function toHex(value: number, width = 0): string {
  return `0x${value.toString(16).padStart(width, '0')}`
}

/**
 * Render an instruction or data word as eight hex digits
 */
export function formatWord(word: number): string {
  return toHex(word >>> 0, 8)
}

/**
 * Register name as printed in decoded listings (`$0` .. `$31`)
 */
export function registerName(index: number): string {
  return `$${index}`
}

/**
 * Whether `value` is an integer in the unsigned 32-bit range
 */
export function isWord(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_WORD
}
