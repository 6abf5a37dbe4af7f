/**
 * 32-bit word helpers
 *
 * JS bitwise operators work on int32; these keep the signed/unsigned views of
 * a register value explicit.
 */

export const WORD_MASK = 0xffffffff

/**
 * Reinterpret a 32-bit pattern as two's-complement signed
 */
export function toSigned32(value: number): number {
  return value | 0
}

/**
 * Reduce a number to its unsigned 32-bit pattern (mod 2^32)
 */
export function toUnsigned32(value: number): number {
  return value >>> 0
}

/**
 * Format a 32-bit pattern as 0x-prefixed, zero-padded hex
 */
export function toHex32(value: number): string {
  return `0x${toUnsigned32(value).toString(16).padStart(8, '0')}`
}
