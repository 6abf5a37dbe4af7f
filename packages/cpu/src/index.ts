/**
 * CPU Package Exports
 *
 * RV32I register file and register-immediate instruction semantics
 */

// Logger
export { logger } from '@rvsim/core'
// Re-export types from centralized types package
export * from '@rvsim/types'
// Configuration constants
export {
  cpuEnvSchema,
  DEFAULTS,
  ERROR_CODES,
  IMMEDIATE_CONFIG,
  loadCpuConfig,
  REGISTER_CONFIG,
  SHIFT_CONFIG,
  shiftAmountPolicySchema,
} from './config'
export type { CpuConfig, ErrorCode } from './config'
// Executor
export {
  apply,
  createExecutorFromEnv,
  InstructionExecutor,
} from './executor'
export type { ExecutorOptions } from './executor'
// Instruction handlers
export { ADDIInstruction } from './instructions/arithmetic'
export { BaseInstruction } from './instructions/base'
export type { ImmediateInstructionHandler } from './instructions/base'
export {
  ANDIInstruction,
  ORIInstruction,
  XORIInstruction,
} from './instructions/bitwise'
export { SLTIInstruction, SLTIUInstruction } from './instructions/comparison'
export { InstructionRegistry } from './instructions/registry'
export {
  SLLIInstruction,
  SRAIInstruction,
  SRLIInstruction,
} from './instructions/shifts'
// Register file
export { isRegisterIndex, RegisterFile } from './register-file'
// Instruction validation
export {
  immediateInstructionSchema,
  parseImmediateInstruction,
} from './schemas'
// Immediate sign extension
export { signExtend, signExtendImmediate } from './sign-extend'
// Errors
export {
  CpuError,
  InvalidRegisterError,
  ShiftAmountError,
  UnknownOperationError,
} from './types'
