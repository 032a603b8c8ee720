/* eslint-disable no-bitwise -- Digit sets are stored as 9-bit masks. */

export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * A set of digits packed into an integer: bit `d - 1` is set when digit `d` is a member.
 */
export type DigitMask = number;

export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];
export const DIGIT_COUNT = DIGITS.length;

export const EMPTY_MASK: DigitMask = 0;
export const FULL_MASK: DigitMask = (1 << DIGIT_COUNT) - 1;

export function addDigit(mask: DigitMask, digit: Digit): DigitMask {
  return mask | digitBit(digit);
}

export function complementMask(mask: DigitMask): DigitMask {
  return ~mask & FULL_MASK;
}

export function countDigits(mask: DigitMask): number {
  let count = 0;
  let rest = mask & FULL_MASK;
  while (rest !== 0) {
    // Drops the lowest set bit.
    rest &= rest - 1;
    count++;
  }
  return count;
}

export function digitBit(digit: Digit): DigitMask {
  return 1 << (digit - 1);
}

export function hasDigit(mask: DigitMask, digit: Digit): boolean {
  return (mask & digitBit(digit)) !== 0;
}

export function isDigit(value: unknown): value is Digit {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= DIGIT_COUNT;
}

/**
 * Lists the members of `mask` in ascending order.
 */
export function maskDigits(mask: DigitMask): Digit[] {
  return DIGITS.filter((digit) => hasDigit(mask, digit));
}

export function maskOf(digits: Iterable<Digit>): DigitMask {
  let mask = EMPTY_MASK;
  for (const digit of digits) {
    mask = addDigit(mask, digit);
  }
  return mask;
}

export function removeDigit(mask: DigitMask, digit: Digit): DigitMask {
  return mask & ~digitBit(digit);
}

/* eslint-enable no-bitwise -- End of mask helpers. */
