/**
 * CPU Configuration Constants
 *
 * Register, immediate and shift parameters of the RV32I register-immediate
 * group, plus the environment schema for runtime options.
 */

import {
  createEnvSchema,
  type LogLevel,
  loadEnvVariables,
  z,
} from '@rvsim/core'
import type { ShiftAmountPolicy } from '@rvsim/types'

// Register configuration
export const REGISTER_CONFIG = {
  COUNT: 32, // x0-x31
  ZERO: 0, // x0 is hard-wired to zero
} as const

// Immediate configuration
export const IMMEDIATE_CONFIG = {
  WIDTH: 12, // I-type immediate field width in bits
} as const

// Shift configuration
export const SHIFT_CONFIG = {
  SHAMT_MASK: 0x1f,
  MAX_SHAMT: 31,
} as const

export const DEFAULTS = {
  SHIFT_POLICY: 'mask',
} as const satisfies { SHIFT_POLICY: ShiftAmountPolicy }

// Error codes carried by CpuError.code
export const ERROR_CODES = {
  INVALID_REGISTER: 'INVALID_REGISTER',
  INVALID_SHIFT_AMOUNT: 'INVALID_SHIFT_AMOUNT',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  INVALID_BIT_WIDTH: 'INVALID_BIT_WIDTH',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export const shiftAmountPolicySchema = z.enum(['mask', 'strict'])

export const cpuEnvSchema = createEnvSchema({
  RV_SHIFT_AMOUNT_POLICY: shiftAmountPolicySchema.default(DEFAULTS.SHIFT_POLICY),
})

export interface CpuConfig {
  shiftPolicy: ShiftAmountPolicy
  logLevel: LogLevel
}

/**
 * Load CPU runtime options from the environment (and an optional .env file)
 */
export function loadCpuConfig(envPath?: string): CpuConfig {
  const env = loadEnvVariables(cpuEnvSchema, envPath)
  return {
    shiftPolicy: env.RV_SHIFT_AMOUNT_POLICY,
    logLevel: env.LOG_LEVEL,
  }
}
