import { logger, toSigned32 } from '@rvsim/core'
import type { ImmediateInstruction, InstructionContext } from '@rvsim/types'
import { BaseInstruction } from './base'

/**
 * SLTI instruction
 * x[rd] = signed(x[rs1]) < signed(imm) ? 1 : 0
 */
export class SLTIInstruction extends BaseInstruction {
  readonly operation = 'slti'
  readonly name = 'SLTI'
  readonly description = 'Set if less than immediate (signed)'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = toSigned32(this.getSourceValue(context))
    const immediate = toSigned32(this.getImmediate(context))
    const result = registerValue < immediate ? 1 : 0

    logger.debug('Executing SLTI instruction', {
      rd,
      rs1,
      immediate,
      registerValue,
      result,
    })

    this.setDestinationValue(context, result)
  }
}

/**
 * SLTIU instruction
 * x[rd] = unsigned(x[rs1]) < unsigned(imm) ? 1 : 0
 *
 * The immediate is sign-extended as a bit pattern but compared unsigned, so
 * imm = 1 sets rd when rs1 is zero (seqz).
 */
export class SLTIUInstruction extends BaseInstruction {
  readonly operation = 'sltiu'
  readonly name = 'SLTIU'
  readonly description = 'Set if less than immediate (unsigned)'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = this.getSourceValue(context)
    const immediate = this.getImmediate(context)
    const result = registerValue < immediate ? 1 : 0

    logger.debug('Executing SLTIU instruction', {
      rd,
      rs1,
      immediate,
      registerValue,
      result,
    })

    this.setDestinationValue(context, result)
  }

  /**
   * sltiu rd, rs1, 1 == seqz rd, rs1
   */
  protected disassembleAlias(instruction: ImmediateInstruction): string | null {
    if (toSigned32(instruction.imm) !== 1) return null
    return `seqz ${this.formatRegister(instruction.rd)}, ${this.formatRegister(instruction.rs1)}`
  }
}
