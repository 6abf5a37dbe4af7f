/**
 * Register File
 *
 * 32 general-purpose 32-bit registers. x0 always reads as zero and ignores
 * writes; every other register reads back the last value written.
 */

import type { RegisterIndex, Registers } from '@rvsim/types'
import { REGISTER_CONFIG } from './config'
import { InvalidRegisterError } from './types'

export function isRegisterIndex(index: number): index is RegisterIndex {
  return Number.isInteger(index) && index >= 0 && index < REGISTER_CONFIG.COUNT
}

export class RegisterFile implements Registers {
  private readonly registers = new Uint32Array(REGISTER_CONFIG.COUNT)

  /**
   * @throws InvalidRegisterError when index is not an integer in 0-31
   */
  read(index: number): number {
    this.assertIndex(index)
    if (index === REGISTER_CONFIG.ZERO) return 0
    return this.registers[index]
  }

  /**
   * Stores value mod 2^32; writes to x0 are discarded
   * @throws InvalidRegisterError when index is not an integer in 0-31
   */
  write(index: number, value: number): void {
    this.assertIndex(index)
    if (index === REGISTER_CONFIG.ZERO) return
    this.registers[index] = value >>> 0
  }

  private assertIndex(index: number): asserts index is RegisterIndex {
    if (!isRegisterIndex(index)) {
      throw new InvalidRegisterError(index)
    }
  }
}
