/**
 * Base Instruction System
 *
 * Defines the handler interface and abstract class shared by the
 * register-immediate instructions.
 */

import { toSigned32, toUnsigned32 } from '@rvsim/core'
import type {
  DisassembleOptions,
  ImmediateInstruction,
  ImmediateOperation,
  InstructionContext,
} from '@rvsim/types'
import { SHIFT_CONFIG } from '../config'
import { ShiftAmountError } from '../types'

/**
 * Base interface for all register-immediate instruction handlers
 */
export interface ImmediateInstructionHandler {
  readonly operation: ImmediateOperation
  readonly name: string
  readonly description: string

  /**
   * Execute the instruction (mutates context.registers in place)
   */
  execute(context: InstructionContext): void

  /**
   * Render the instruction in assembly syntax
   */
  disassemble(
    instruction: ImmediateInstruction,
    options?: DisassembleOptions,
  ): string
}

/**
 * Abstract base class for register-immediate instructions
 * rd <- f(x[rs1], imm), always read-then-write through the register file
 */
export abstract class BaseInstruction implements ImmediateInstructionHandler {
  abstract readonly operation: ImmediateOperation
  abstract readonly name: string
  abstract readonly description: string

  abstract execute(context: InstructionContext): void

  /**
   * Read x[rs1] as an unsigned 32-bit pattern
   */
  protected getSourceValue(context: InstructionContext): number {
    return toUnsigned32(context.registers.read(context.instruction.rs1))
  }

  /**
   * Immediate as an unsigned 32-bit pattern
   */
  protected getImmediate(context: InstructionContext): number {
    return toUnsigned32(context.instruction.imm)
  }

  /**
   * Write the result to x[rd], reduced mod 2^32
   */
  protected setDestinationValue(
    context: InstructionContext,
    value: number,
  ): void {
    context.registers.write(context.instruction.rd, toUnsigned32(value))
  }

  /**
   * Shift amount from the immediate
   * mask: low 5 bits; strict: anything above 31 is rejected before any write
   */
  protected getShiftAmount(context: InstructionContext): number {
    const immediate = this.getImmediate(context)
    if (
      context.options.shiftPolicy === 'strict' &&
      immediate > SHIFT_CONFIG.MAX_SHAMT
    ) {
      throw new ShiftAmountError(immediate, this.operation)
    }
    return immediate & SHIFT_CONFIG.SHAMT_MASK
  }

  disassemble(
    instruction: ImmediateInstruction,
    options: DisassembleOptions = {},
  ): string {
    const alias = options.aliases ? this.disassembleAlias(instruction) : null
    if (alias !== null) return alias

    const { rd, rs1, imm } = instruction
    return `${this.operation} ${this.formatRegister(rd)}, ${this.formatRegister(rs1)}, ${this.formatImmediate(imm)}`
  }

  /**
   * Pseudo-instruction rendering, null when the instruction has no alias
   */
  protected disassembleAlias(_instruction: ImmediateInstruction): string | null {
    return null
  }

  /**
   * Arithmetic and logical immediates print as signed decimal
   */
  protected formatImmediate(imm: number): string {
    return String(toSigned32(imm))
  }

  protected formatRegister(index: number): string {
    return `x${index}`
  }
}
