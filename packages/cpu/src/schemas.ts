import { WORD_MASK, z } from '@rvsim/core'
import {
  IMMEDIATE_OPERATIONS,
  type ImmediateInstruction,
  type Safe,
  safeError,
  safeResult,
} from '@rvsim/types'
import { REGISTER_CONFIG } from './config'

const registerIndexSchema = z
  .number()
  .int()
  .min(0)
  .max(REGISTER_CONFIG.COUNT - 1)

export const immediateInstructionSchema = z.object({
  operation: z.enum(IMMEDIATE_OPERATIONS),
  rd: registerIndexSchema,
  rs1: registerIndexSchema,
  // signed or unsigned view of a 32-bit pattern
  imm: z.number().int().min(-0x80000000).max(WORD_MASK),
})

/**
 * Validate an untyped, already-decoded instruction record
 */
export function parseImmediateInstruction(
  input: unknown,
): Safe<ImmediateInstruction> {
  const parsed = immediateInstructionSchema.safeParse(input)
  if (!parsed.success) {
    return safeError(parsed.error)
  }
  return safeResult(parsed.data)
}
