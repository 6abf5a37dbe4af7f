/**
 * Arithmetic Instructions
 *
 * ADDI - Add sign-extended immediate
 */

import { logger, toSigned32 } from '@rvsim/core'
import type { ImmediateInstruction, InstructionContext } from '@rvsim/types'
import { BaseInstruction } from './base'

/**
 * ADDI instruction
 * x[rd] = (signed(x[rs1]) + signed(imm)) mod 2^32
 *
 * Overflow is ignored.
 */
export class ADDIInstruction extends BaseInstruction {
  readonly operation = 'addi'
  readonly name = 'ADDI'
  readonly description = 'Add immediate'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = toSigned32(this.getSourceValue(context))
    const immediate = toSigned32(this.getImmediate(context))
    const result = (registerValue + immediate) | 0

    logger.debug('Executing ADDI instruction', {
      rd,
      rs1,
      immediate,
      registerValue,
      result,
    })

    this.setDestinationValue(context, result)
  }

  /**
   * addi x0, x0, 0 == nop
   * addi rd, x0, imm == li rd, imm
   * addi rd, rs1, 0 == mv rd, rs1
   */
  protected disassembleAlias(instruction: ImmediateInstruction): string | null {
    const { rd, rs1, imm } = instruction
    const immediate = toSigned32(imm)
    if (rd === 0 && rs1 === 0 && immediate === 0) return 'nop'
    if (rs1 === 0) return `li ${this.formatRegister(rd)}, ${immediate}`
    if (immediate === 0) {
      return `mv ${this.formatRegister(rd)}, ${this.formatRegister(rs1)}`
    }
    return null
  }
}
