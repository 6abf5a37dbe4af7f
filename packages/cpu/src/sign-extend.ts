import { ERROR_CODES, IMMEDIATE_CONFIG } from './config'
import { CpuError } from './types'

/**
 * Sign-extend the low `bits` bits of value to 32 bits
 * Bit (bits - 1) is replicated into bits bits..31; anything above the field is discarded.
 *
 * @returns unsigned 32-bit pattern
 */
export function signExtend(value: number, bits: number): number {
  if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
    throw new CpuError(
      `Cannot sign-extend a ${bits}-bit field`,
      ERROR_CODES.INVALID_BIT_WIDTH,
      { value, bits },
    )
  }
  const shift = 32 - bits
  return ((value << shift) >> shift) >>> 0
}

/**
 * Sign-extend a raw 12-bit I-type immediate field
 * 0x800 -> 0xfffff800, 0x7ff -> 0x000007ff
 */
export function signExtendImmediate(value: number): number {
  return signExtend(value, IMMEDIATE_CONFIG.WIDTH)
}
