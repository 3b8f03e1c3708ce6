import { DisbursementError } from '../types/errors.js';

export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * uint256 arithmetic that fails with ArithmeticOverflow instead of wrapping
 */
export class CheckedMath {
  static isUint256(value: bigint): boolean {
    return value >= 0n && value <= MAX_UINT256;
  }

  static assertUint256(value: bigint, label: string): bigint {
    if (!this.isUint256(value)) {
      throw new DisbursementError('ArithmeticOverflow', `${label} is outside the uint256 range: ${value}`);
    }
    return value;
  }

  static add(a: bigint, b: bigint): bigint {
    this.assertUint256(a, 'Left operand');
    this.assertUint256(b, 'Right operand');
    const result = a + b;
    if (result > MAX_UINT256) {
      throw new DisbursementError('ArithmeticOverflow', `Addition overflow: ${a} + ${b}`);
    }
    return result;
  }

  static mul(a: bigint, b: bigint): bigint {
    this.assertUint256(a, 'Left operand');
    this.assertUint256(b, 'Right operand');
    const result = a * b;
    if (result > MAX_UINT256) {
      throw new DisbursementError('ArithmeticOverflow', `Multiplication overflow: ${a} * ${b}`);
    }
    return result;
  }

  /**
   * Sum every value in order; the first step that leaves the uint256 range fails
   */
  static sum(values: readonly bigint[]): bigint {
    return values.reduce((total, value, index) => {
      this.assertUint256(value, `Amount at index ${index}`);
      return this.add(total, value);
    }, 0n);
  }
}
