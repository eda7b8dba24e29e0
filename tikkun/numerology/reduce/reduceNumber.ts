import { InvalidValueError } from "../errors.js";
import {
  MASTER_NUMBERS,
  MasterNumber,
  ReducedNumber,
  SINGLE_DIGITS,
  SingleDigit,
} from "../schema/numerology.schemas.js";

export function isMasterNumber(n: number): n is MasterNumber {
  return MASTER_NUMBERS.some((m) => m === n);
}

export function isSingleDigit(n: number): n is SingleDigit {
  return SINGLE_DIGITS.some((d) => d === n);
}

function assertPositiveInteger(n: number): void {
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidValueError(n);
  }
}

export function sumDigits(n: number): number {
  return [...String(Math.abs(n))].reduce((s, d) => s + Number(d), 0);
}

/**
 * Reduce to 1..9, halting on 11, 22 or 33 at any step (including the input itself).
 * 29 -> 11 stops there; it never continues to 2.
 */
export function reduceNumber(n: number): ReducedNumber {
  assertPositiveInteger(n);

  let current = n;
  while (true) {
    if (isMasterNumber(current)) return { value: current, isMaster: true };
    if (isSingleDigit(current)) return { value: current, isMaster: false };
    current = sumDigits(current);
  }
}

/** Plain reduction to 1..9 with no master exception. */
export function reduceToDigit(n: number): SingleDigit {
  assertPositiveInteger(n);

  let current = n;
  while (!isSingleDigit(current)) {
    current = sumDigits(current);
  }
  return current;
}

/** "5", or the compound form "11/2" for master numbers. */
export function formatReducedNumber(reduced: ReducedNumber): string {
  return reduced.isMaster
    ? `${reduced.value}/${reduceToDigit(reduced.value)}`
    : String(reduced.value);
}
