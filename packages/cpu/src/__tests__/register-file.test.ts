import { describe, expect, it } from 'vitest'
import { ERROR_CODES } from '../config'
import { isRegisterIndex, RegisterFile } from '../register-file'
import { InvalidRegisterError } from '../types'

describe('RegisterFile', () => {
  it('should start with every register at zero', () => {
    const registers = new RegisterFile()
    for (let index = 0; index < 32; index++) {
      expect(registers.read(index)).toBe(0)
    }
  })

  it('should read back the last value written', () => {
    const registers = new RegisterFile()
    registers.write(5, 0x00001234)
    registers.write(5, 0x0badf00d)
    registers.write(31, 0xffffffff)
    expect(registers.read(5)).toBe(0x0badf00d)
    expect(registers.read(31)).toBe(0xffffffff)
    expect(registers.read(6)).toBe(0)
  })

  it('should keep x0 at zero whatever is written to it', () => {
    const registers = new RegisterFile()
    for (const value of [1, 0x7fffffff, 0x80000000, 0xffffffff]) {
      registers.write(0, value)
      expect(registers.read(0)).toBe(0)
    }
  })

  it('should store values modulo 2^32', () => {
    const registers = new RegisterFile()
    registers.write(1, -1)
    registers.write(2, 0x100000005)
    expect(registers.read(1)).toBe(0xffffffff)
    expect(registers.read(2)).toBe(5)
  })

  it('should keep instances independent', () => {
    const first = new RegisterFile()
    const second = new RegisterFile()
    first.write(7, 42)
    expect(second.read(7)).toBe(0)
  })

  describe('invalid register indices', () => {
    it.each([32, -1, 1.5, Number.NaN])('should reject read(%s)', (index) => {
      const registers = new RegisterFile()
      expect(() => registers.read(index)).toThrow(InvalidRegisterError)
    })

    it('should reject a write without touching other registers', () => {
      const registers = new RegisterFile()
      registers.write(1, 9)
      expect(() => registers.write(33, 1)).toThrow(InvalidRegisterError)
      expect(registers.read(1)).toBe(9)
    })

    it('should carry the offending index and error code', () => {
      const registers = new RegisterFile()
      try {
        registers.read(40)
        expect.unreachable('read(40) should throw')
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidRegisterError)
        if (error instanceof InvalidRegisterError) {
          expect(error.index).toBe(40)
          expect(error.code).toBe(ERROR_CODES.INVALID_REGISTER)
          expect(error.message).toBe(
            'Invalid register index 40: expected an integer in 0-31',
          )
        }
      }
    })
  })

  it('should recognise register indices', () => {
    expect(isRegisterIndex(0)).toBe(true)
    expect(isRegisterIndex(31)).toBe(true)
    expect(isRegisterIndex(32)).toBe(false)
    expect(isRegisterIndex(2.5)).toBe(false)
  })
})
