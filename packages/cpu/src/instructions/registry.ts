/**
 * Instruction Registry
 *
 * Maps each register-immediate operation tag to its handler.
 * Handlers are stateless, so one registry can serve any number of register files.
 */

import type { ImmediateOperation } from '@rvsim/types'
import { ADDIInstruction } from './arithmetic'
import type { ImmediateInstructionHandler } from './base'
import { ANDIInstruction, ORIInstruction, XORIInstruction } from './bitwise'
import { SLTIInstruction, SLTIUInstruction } from './comparison'
import { SLLIInstruction, SRAIInstruction, SRLIInstruction } from './shifts'

export class InstructionRegistry {
  private handlers: Map<string, ImmediateInstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Register all instruction handlers
   */
  private registerInstructions(): void {
    // Arithmetic instructions
    this.register(new ADDIInstruction())

    // Comparison instructions
    this.register(new SLTIInstruction())
    this.register(new SLTIUInstruction())

    // Bitwise instructions
    this.register(new ANDIInstruction())
    this.register(new ORIInstruction())
    this.register(new XORIInstruction())

    // Shift instructions
    this.register(new SLLIInstruction())
    this.register(new SRLIInstruction())
    this.register(new SRAIInstruction())
  }

  register(handler: ImmediateInstructionHandler): void {
    this.handlers.set(handler.operation, handler)
  }

  /**
   * Get instruction handler by operation tag
   */
  getHandler(operation: string): ImmediateInstructionHandler | undefined {
    return this.handlers.get(operation)
  }

  hasHandler(operation: string): boolean {
    return this.handlers.has(operation)
  }

  getRegisteredOperations(): ImmediateOperation[] {
    return Array.from(this.handlers.values(), (handler) => handler.operation)
  }
}
