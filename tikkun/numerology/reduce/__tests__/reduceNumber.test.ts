import { describe, expect, it } from "vitest";
import { InvalidValueError } from "../../errors.js";
import {
  formatReducedNumber,
  isMasterNumber,
  reduceNumber,
  reduceToDigit,
  sumDigits,
} from "../reduceNumber.js";

describe("reduceNumber", () => {
  it("returns single digits unchanged", () => {
    for (let n = 1; n <= 9; n++) {
      expect(reduceNumber(n)).toEqual({ value: n, isMaster: false });
    }
  });

  it("halts on master numbers given directly", () => {
    expect(reduceNumber(11)).toEqual({ value: 11, isMaster: true });
    expect(reduceNumber(22)).toEqual({ value: 22, isMaster: true });
    expect(reduceNumber(33)).toEqual({ value: 33, isMaster: true });
  });

  it("halts on a master number reached mid-reduction", () => {
    // 29 -> 11, never 2
    expect(reduceNumber(29)).toEqual({ value: 11, isMaster: true });
    expect(reduceNumber(38)).toEqual({ value: 11, isMaster: true });
    // 1993 -> 22
    expect(reduceNumber(1993)).toEqual({ value: 22, isMaster: true });
    // 2999 -> 29 -> 11
    expect(reduceNumber(2999)).toEqual({ value: 11, isMaster: true });
  });

  it("reduces through several rounds", () => {
    // 1990 -> 19 -> 10 -> 1
    expect(reduceNumber(1990)).toEqual({ value: 1, isMaster: false });
    expect(reduceNumber(32)).toEqual({ value: 5, isMaster: false });
    // 44 is not a master number here
    expect(reduceNumber(44)).toEqual({ value: 8, isMaster: false });
  });

  it("is idempotent on its outputs", () => {
    for (const n of [7, 11, 22, 33, 29, 1987, 123456]) {
      const once = reduceNumber(n);
      expect(reduceNumber(once.value)).toEqual(once);
    }
  });

  it("always lands in 1..9 or a master number", () => {
    for (let n = 1; n <= 5000; n++) {
      const { value, isMaster } = reduceNumber(n);
      expect(isMaster).toBe(isMasterNumber(value));
      expect(isMaster || (value >= 1 && value <= 9)).toBe(true);
    }
  });

  it("rejects zero, negatives and non-integers", () => {
    expect(() => reduceNumber(0)).toThrow(InvalidValueError);
    expect(() => reduceNumber(-5)).toThrow(InvalidValueError);
    expect(() => reduceNumber(1.5)).toThrow(InvalidValueError);
    expect(() => reduceNumber(Number.NaN)).toThrow(InvalidValueError);
  });

  it("reports the rejected value", () => {
    try {
      reduceNumber(-5);
      expect.unreachable("reduceNumber(-5) should throw");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(InvalidValueError);
      if (err instanceof InvalidValueError) {
        expect(err.value).toBe(-5);
        expect(err.message).toBe("Cannot reduce -5: expected a positive integer");
      }
    }
  });
});

describe("reduceToDigit", () => {
  it("ignores the master exception", () => {
    expect(reduceToDigit(11)).toBe(2);
    expect(reduceToDigit(22)).toBe(4);
    expect(reduceToDigit(33)).toBe(6);
    expect(reduceToDigit(29)).toBe(2);
  });
});

describe("sumDigits", () => {
  it("adds decimal digits", () => {
    expect(sumDigits(1990)).toBe(19);
    expect(sumDigits(29)).toBe(11);
    expect(sumDigits(7)).toBe(7);
  });
});

describe("formatReducedNumber", () => {
  it("renders masters in compound form", () => {
    expect(formatReducedNumber({ value: 11, isMaster: true })).toBe("11/2");
    expect(formatReducedNumber({ value: 22, isMaster: true })).toBe("22/4");
    expect(formatReducedNumber({ value: 33, isMaster: true })).toBe("33/6");
    expect(formatReducedNumber({ value: 5, isMaster: false })).toBe("5");
  });
});
