import { describe, expect, it } from 'vitest'
import {
  runImmediateOp,
  runSourceEqualsDest,
  runZeroDest,
  runZeroSource,
} from './test-helper'

describe('Comparison Instructions', () => {
  describe('SLTI', () => {
    it('should compare small positive values', () => {
      expect(runImmediateOp('slti', 5, 0x009)).toBe(1)
      expect(runImmediateOp('slti', 9, 0x005)).toBe(0)
      expect(runImmediateOp('slti', 5, 0x005)).toBe(0)
    })

    it('should treat the source as signed', () => {
      expect(runImmediateOp('slti', 0x80000000, 0x000)).toBe(1)
      expect(runImmediateOp('slti', 0x7fffffff, 0xfff)).toBe(0)
    })

    it('should treat the immediate as signed', () => {
      expect(runImmediateOp('slti', 0x00000000, 0x800)).toBe(0)
      expect(runImmediateOp('slti', 0xfffffff0, 0xff8)).toBe(1)
      expect(runImmediateOp('slti', 0xfffffff8, 0xff0)).toBe(0)
    })

    it('should support rd == rs1', () => {
      expect(runSourceEqualsDest('slti', 6, 0x00c)).toBe(1)
    })

    it('should read x0 as zero', () => {
      expect(runZeroSource('slti', 0x001)).toBe(1)
      expect(runZeroSource('slti', 0xfff)).toBe(0)
    })

    it('should discard a write to x0', () => {
      expect(runZeroDest('slti', 0x00000001, 0x7ff)).toBe(0)
    })
  })

  describe('SLTIU', () => {
    it('should compare small values', () => {
      expect(runImmediateOp('sltiu', 7, 0x010)).toBe(1)
      expect(runImmediateOp('sltiu', 16, 0x010)).toBe(0)
    })

    it('should treat the source as unsigned', () => {
      expect(runImmediateOp('sltiu', 0x80000000, 0x000)).toBe(0)
    })

    it('should compare against the sign-extended pattern as unsigned', () => {
      expect(runImmediateOp('sltiu', 0x00000000, 0x800)).toBe(1)
      expect(runImmediateOp('sltiu', 0xfffff000, 0xfff)).toBe(1)
      expect(runImmediateOp('sltiu', 0xffffffff, 0xfff)).toBe(0)
    })

    it('should set rd only when rs1 is zero for an immediate of 1', () => {
      expect(runImmediateOp('sltiu', 0x00000000, 0x001)).toBe(1)
      expect(runImmediateOp('sltiu', 0x00000001, 0x001)).toBe(0)
      expect(runImmediateOp('sltiu', 0x80000000, 0x001)).toBe(0)
    })

    it('should support rd == rs1', () => {
      expect(runSourceEqualsDest('sltiu', 20, 0x00a)).toBe(0)
    })

    it('should read x0 as zero', () => {
      expect(runZeroSource('sltiu', 0x000)).toBe(0)
      expect(runZeroSource('sltiu', 0x800)).toBe(1)
    })

    it('should discard a write to x0', () => {
      expect(runZeroDest('sltiu', 0x00000001, 0xfff)).toBe(0)
    })
  })

  it('should disagree between signed and unsigned for a negative source', () => {
    expect(runImmediateOp('slti', 0x80000000, 0x000)).toBe(1)
    expect(runImmediateOp('sltiu', 0x80000000, 0x000)).toBe(0)
  })
})
