/**
 * Instruction Executor
 *
 * Single dispatch entry point for the register-immediate group, and a
 * convenience class that owns a register file and exposes one method per
 * instruction.
 */

import { logger, toHex32 } from '@rvsim/core'
import {
  type DisassembleOptions,
  type ExecutionOptions,
  type ImmediateInstruction,
  type ImmediateOperation,
  type Registers,
  type Safe,
  type ShiftAmountPolicy,
  safeCall,
} from '@rvsim/types'
import { DEFAULTS, loadCpuConfig } from './config'
import type { ImmediateInstructionHandler } from './instructions/base'
import { InstructionRegistry } from './instructions/registry'
import { RegisterFile } from './register-file'
import { UnknownOperationError } from './types'

const defaultRegistry = new InstructionRegistry()

function resolveHandler(
  operation: string,
  registry: InstructionRegistry,
): ImmediateInstructionHandler {
  const handler = registry.getHandler(operation)
  if (!handler) {
    throw new UnknownOperationError(operation)
  }
  return handler
}

/**
 * Apply one register-immediate instruction to a register file
 *
 * Reads x[rs1], computes the result and writes x[rd]. imm must already be a
 * 32-bit pattern (see signExtendImmediate for raw 12-bit fields).
 *
 * @throws UnknownOperationError, InvalidRegisterError, ShiftAmountError
 */
export function apply(
  operation: ImmediateOperation,
  rd: number,
  rs1: number,
  imm: number,
  registers: Registers,
  options: Partial<ExecutionOptions> = {},
  registry: InstructionRegistry = defaultRegistry,
): void {
  const handler = resolveHandler(operation, registry)
  handler.execute({
    instruction: { operation, rd, rs1, imm },
    registers,
    options: { shiftPolicy: options.shiftPolicy ?? DEFAULTS.SHIFT_POLICY },
  })
}

export interface ExecutorOptions {
  shiftPolicy?: ShiftAmountPolicy
  registry?: InstructionRegistry
}

export class InstructionExecutor {
  readonly registers: RegisterFile
  readonly shiftPolicy: ShiftAmountPolicy
  private readonly registry: InstructionRegistry

  constructor(
    registers: RegisterFile = new RegisterFile(),
    options: ExecutorOptions = {},
  ) {
    this.registers = registers
    this.shiftPolicy = options.shiftPolicy ?? DEFAULTS.SHIFT_POLICY
    this.registry = options.registry ?? defaultRegistry
  }

  /**
   * Add a sign-extended immediate to rs1. Overflow is ignored.
   * `ADDI rd, rs1, 0` == `MV rd, rs1`
   */
  addi(rd: number, rs1: number, imm: number): void {
    this.apply('addi', rd, rs1, imm)
  }

  /** Check if rs1 is less than imm (signed) */
  slti(rd: number, rs1: number, imm: number): void {
    this.apply('slti', rd, rs1, imm)
  }

  /**
   * Check if rs1 is less than imm in an unsigned comparison
   * `SLTIU rd, rs1, 1` == `SEQZ rd, rs1`
   */
  sltiu(rd: number, rs1: number, imm: number): void {
    this.apply('sltiu', rd, rs1, imm)
  }

  andi(rd: number, rs1: number, imm: number): void {
    this.apply('andi', rd, rs1, imm)
  }

  ori(rd: number, rs1: number, imm: number): void {
    this.apply('ori', rd, rs1, imm)
  }

  /** `XORI rd, rs1, -1` == `NOT rd, rs1` */
  xori(rd: number, rs1: number, imm: number): void {
    this.apply('xori', rd, rs1, imm)
  }

  slli(rd: number, rs1: number, imm: number): void {
    this.apply('slli', rd, rs1, imm)
  }

  /** Zeroes are shifted into the upper bits */
  srli(rd: number, rs1: number, imm: number): void {
    this.apply('srli', rd, rs1, imm)
  }

  /** The original sign bit is shifted into the upper bits */
  srai(rd: number, rs1: number, imm: number): void {
    this.apply('srai', rd, rs1, imm)
  }

  apply(
    operation: ImmediateOperation,
    rd: number,
    rs1: number,
    imm: number,
  ): void {
    apply(
      operation,
      rd,
      rs1,
      imm,
      this.registers,
      { shiftPolicy: this.shiftPolicy },
      this.registry,
    )
  }

  /**
   * Run an already-decoded instruction without throwing
   * @returns the value now held by rd, or the rejection error
   */
  execute(instruction: ImmediateInstruction): Safe<number> {
    const result = safeCall(() => {
      this.apply(
        instruction.operation,
        instruction.rd,
        instruction.rs1,
        instruction.imm,
      )
      return this.registers.read(instruction.rd)
    })

    const [error, value] = result
    if (value === undefined) {
      const handler = this.registry.getHandler(instruction.operation)
      logger.warn('Instruction rejected', {
        instruction: handler?.description ?? instruction.operation,
        operation: instruction.operation,
        rd: instruction.rd,
        rs1: instruction.rs1,
        imm: instruction.imm,
        error: error?.message,
      })
    } else {
      logger.debug('Instruction executed', {
        operation: instruction.operation,
        rd: instruction.rd,
        value: toHex32(value),
      })
    }
    return result
  }

  disassemble(
    instruction: ImmediateInstruction,
    options?: DisassembleOptions,
  ): string {
    return resolveHandler(instruction.operation, this.registry).disassemble(
      instruction,
      options,
    )
  }
}

/**
 * Build an executor whose shift policy comes from RV_SHIFT_AMOUNT_POLICY
 * LOG_LEVEL from the same environment is applied to the shared logger.
 */
export function createExecutorFromEnv(envPath?: string): InstructionExecutor {
  const config = loadCpuConfig(envPath)
  logger.setLevel(config.logLevel)
  logger.debug('Creating instruction executor from environment', {
    shiftPolicy: config.shiftPolicy,
  })
  return new InstructionExecutor(new RegisterFile(), {
    shiftPolicy: config.shiftPolicy,
  })
}
