import { ERROR_CODES, type ErrorCode } from './config'

// CPU Error types
export class CpuError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'CpuError'
  }
}

export class InvalidRegisterError extends CpuError {
  constructor(public index: number) {
    super(
      `Invalid register index ${index}: expected an integer in 0-31`,
      ERROR_CODES.INVALID_REGISTER,
      { index },
    )
    this.name = 'InvalidRegisterError'
  }
}

export class ShiftAmountError extends CpuError {
  constructor(
    public shiftAmount: number,
    public operation?: string,
  ) {
    super(
      `Shift amount ${shiftAmount} out of range 0-31`,
      ERROR_CODES.INVALID_SHIFT_AMOUNT,
      { shiftAmount, operation },
    )
    this.name = 'ShiftAmountError'
  }
}

export class UnknownOperationError extends CpuError {
  constructor(public operation: string) {
    super(
      `Unknown register-immediate operation: ${operation}`,
      ERROR_CODES.UNKNOWN_OPERATION,
      { operation },
    )
    this.name = 'UnknownOperationError'
  }
}
