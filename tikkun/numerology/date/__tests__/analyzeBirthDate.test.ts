import { describe, expect, it } from "vitest";
import { InvalidDateError } from "../../errors.js";
import { reduceNumber } from "../../reduce/reduceNumber.js";
import { analyzeBirthDate } from "../analyzeBirthDate.js";

describe("analyzeBirthDate", () => {
  it("derives all four date numbers for 1990-11-29", () => {
    const numbers = analyzeBirthDate({ day: 29, month: 11, year: 1990 });

    expect(numbers.dayEnergy).toEqual({ value: 11, isMaster: true });
    expect(numbers.monthEnergy).toEqual({ value: 11, isMaster: true });
    expect(numbers.yearEnergy).toEqual({ value: 1, isMaster: false });
    // 2+9 + 1+1 + 1+9+9+0 = 32 -> 5
    expect(numbers.lifePath).toEqual({ value: 5, isMaster: false });
    expect(numbers.dateBreakdown).toEqual({
      day: 29,
      month: 11,
      year: 1990,
      yearDigitSum: 19,
      dateDigitSum: 32,
    });
  });

  it("keeps a master life path carried by the raw digits", () => {
    // 6 + 1 + (1+9+5+0) = 22, while the reduced energies 6 + 1 + 6 would give 4
    const numbers = analyzeBirthDate({ day: 6, month: 1, year: 1950 });
    expect(numbers.lifePath).toEqual({ value: 22, isMaster: true });
    expect(numbers.yearEnergy).toEqual({ value: 6, isMaster: false });

    const resummed =
      numbers.dayEnergy.value + numbers.monthEnergy.value + numbers.yearEnergy.value;
    expect(reduceNumber(resummed)).toEqual({ value: 4, isMaster: false });
  });

  it("reaches life path 11 through 29", () => {
    // 8 + 1 + (1+9+9+1) = 29 -> 11
    expect(analyzeBirthDate({ day: 8, month: 1, year: 1991 }).lifePath).toEqual({
      value: 11,
      isMaster: true,
    });
  });

  it("keeps a master day energy", () => {
    const numbers = analyzeBirthDate({ day: 22, month: 3, year: 1977 });
    expect(numbers.dayEnergy).toEqual({ value: 22, isMaster: true });
    expect(numbers.lifePath).toEqual({ value: 4, isMaster: false });
  });

  it("is deterministic", () => {
    const date = { day: 4, month: 7, year: 1985 };
    expect(analyzeBirthDate(date)).toEqual(analyzeBirthDate(date));
  });

  it("revalidates dates that bypassed the parser", () => {
    expect(() => analyzeBirthDate({ day: 31, month: 2, year: 1990 })).toThrow(
      InvalidDateError
    );
  });
});
