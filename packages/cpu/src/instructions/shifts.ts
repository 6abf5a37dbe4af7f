import { logger, toSigned32 } from '@rvsim/core'
import type { InstructionContext } from '@rvsim/types'
import { SHIFT_CONFIG } from '../config'
import { BaseInstruction } from './base'

/**
 * Shared base for the three immediate shifts
 * Only the 5-bit shamt field is printed
 */
abstract class ShiftImmediateInstruction extends BaseInstruction {
  protected formatImmediate(imm: number): string {
    return String(imm & SHIFT_CONFIG.SHAMT_MASK)
  }
}

/**
 * SLLI instruction
 * x[rd] = (x[rs1] << shamt) mod 2^32
 */
export class SLLIInstruction extends ShiftImmediateInstruction {
  readonly operation = 'slli'
  readonly name = 'SLLI'
  readonly description = 'Logical left shift by immediate'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = this.getSourceValue(context)
    const shiftAmount = this.getShiftAmount(context)
    const result = registerValue << shiftAmount

    logger.debug('Executing SLLI instruction', {
      rd,
      rs1,
      registerValue,
      shiftAmount,
      result,
    })

    this.setDestinationValue(context, result)
  }
}

/**
 * SRLI instruction
 * Zeroes are shifted into the upper bits.
 */
export class SRLIInstruction extends ShiftImmediateInstruction {
  readonly operation = 'srli'
  readonly name = 'SRLI'
  readonly description = 'Logical right shift by immediate'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = this.getSourceValue(context)
    const shiftAmount = this.getShiftAmount(context)
    const result = registerValue >>> shiftAmount

    logger.debug('Executing SRLI instruction', {
      rd,
      rs1,
      registerValue,
      shiftAmount,
      result,
    })

    this.setDestinationValue(context, result)
  }
}

/**
 * SRAI instruction
 * The original sign bit is shifted into the upper bits.
 */
export class SRAIInstruction extends ShiftImmediateInstruction {
  readonly operation = 'srai'
  readonly name = 'SRAI'
  readonly description = 'Arithmetic right shift by immediate'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const signedValue = toSigned32(this.getSourceValue(context))
    const shiftAmount = this.getShiftAmount(context)
    const result = signedValue >> shiftAmount

    logger.debug('Executing SRAI instruction', {
      rd,
      rs1,
      signedValue,
      shiftAmount,
      result,
    })

    this.setDestinationValue(context, result)
  }
}
