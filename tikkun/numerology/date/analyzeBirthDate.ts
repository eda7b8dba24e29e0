import { reduceNumber, sumDigits } from "../reduce/reduceNumber.js";
import { BirthDate, DateNumbers } from "../schema/numerology.schemas.js";
import { createBirthDate } from "./birthDate.js";

/**
 * Life path comes from the digit sum of the whole date. Summing the already
 * reduced energies would lose master numbers carried by the raw digits.
 */
export function analyzeBirthDate(date: BirthDate): DateNumbers {
  const { day, month, year } = createBirthDate(date);

  const yearDigitSum = sumDigits(year);
  const dateDigitSum = sumDigits(day) + sumDigits(month) + yearDigitSum;

  return {
    lifePath: reduceNumber(dateDigitSum),
    dayEnergy: reduceNumber(day),
    monthEnergy: reduceNumber(month),
    yearEnergy: reduceNumber(yearDigitSum),
    dateBreakdown: { day, month, year, yearDigitSum, dateDigitSum },
  };
}
