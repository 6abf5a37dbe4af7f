import { logger, toSigned32 } from '@rvsim/core'
import type { ImmediateInstruction, InstructionContext } from '@rvsim/types'
import { BaseInstruction } from './base'

export class ANDIInstruction extends BaseInstruction {
  readonly operation = 'andi'
  readonly name = 'ANDI'
  readonly description = 'Bitwise AND with immediate'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = this.getSourceValue(context)
    const immediate = this.getImmediate(context)
    const result = registerValue & immediate

    logger.debug('Executing ANDI instruction', {
      rd,
      rs1,
      immediate,
      registerValue,
      result,
    })

    this.setDestinationValue(context, result)
  }
}

export class ORIInstruction extends BaseInstruction {
  readonly operation = 'ori'
  readonly name = 'ORI'
  readonly description = 'Bitwise OR with immediate'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = this.getSourceValue(context)
    const immediate = this.getImmediate(context)
    const result = registerValue | immediate

    logger.debug('Executing ORI instruction', {
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
 * XORI instruction
 * XORI rd, rs1, -1 == NOT rd, rs1
 */
export class XORIInstruction extends BaseInstruction {
  readonly operation = 'xori'
  readonly name = 'XORI'
  readonly description = 'Bitwise XOR with immediate'

  execute(context: InstructionContext): void {
    const { rd, rs1 } = context.instruction
    const registerValue = this.getSourceValue(context)
    const immediate = this.getImmediate(context)
    const result = registerValue ^ immediate

    logger.debug('Executing XORI instruction', {
      rd,
      rs1,
      immediate,
      registerValue,
      result,
    })

    this.setDestinationValue(context, result)
  }

  protected disassembleAlias(instruction: ImmediateInstruction): string | null {
    if (toSigned32(instruction.imm) !== -1) return null
    return `not ${this.formatRegister(instruction.rd)}, ${this.formatRegister(instruction.rs1)}`
  }
}
