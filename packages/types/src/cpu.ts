/**
 * Register-immediate instruction core types
 *
 * Shared by the register file, the instruction handlers and any driver that
 * feeds them already-decoded instructions.
 */

/**
 * Architectural register index: x0-x31
 * x0 is hard-wired to zero
 */
export type RegisterIndex =
  | 0
  | 1
  | 2
  | 3
  | 4
  | 5
  | 6
  | 7
  | 8
  | 9
  | 10
  | 11
  | 12
  | 13
  | 14
  | 15
  | 16
  | 17
  | 18
  | 19
  | 20
  | 21
  | 22
  | 23
  | 24
  | 25
  | 26
  | 27
  | 28
  | 29
  | 30
  | 31

/**
 * Closed set of register-immediate operations, by lowercase mnemonic
 */
export const IMMEDIATE_OPERATIONS = [
  'addi',
  'slti',
  'sltiu',
  'andi',
  'ori',
  'xori',
  'slli',
  'srli',
  'srai',
] as const

export type ImmediateOperation = (typeof IMMEDIATE_OPERATIONS)[number]

/**
 * How a shift instruction treats an immediate above 31
 * - mask: use the low 5 bits (architectural behaviour)
 * - strict: reject the instruction
 */
export type ShiftAmountPolicy = 'mask' | 'strict'

/**
 * Register file contract: plain 32-bit storage with x0 reading as zero
 */
export interface Registers {
  read(index: number): number
  write(index: number, value: number): void
}

/**
 * An already-decoded register-immediate instruction
 * imm is a 32-bit pattern (sign-extend raw 12-bit fields before building this)
 */
export interface ImmediateInstruction {
  operation: ImmediateOperation
  rd: number
  rs1: number
  imm: number
}

export interface ExecutionOptions {
  shiftPolicy: ShiftAmountPolicy
}

export interface InstructionContext {
  instruction: ImmediateInstruction
  registers: Registers
  options: ExecutionOptions
}

export interface DisassembleOptions {
  /** Render pseudo-instruction aliases (nop, li, mv, seqz, not) */
  aliases?: boolean
}
