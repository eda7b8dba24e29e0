import { InvalidDateError } from "../errors.js";
import { BirthDate, BirthDateSchema } from "../schema/numerology.schemas.js";

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
// DD/MM/YYYY, DD.MM.YYYY or DD-MM-YYYY; the two separators must match
const DAY_FIRST_DATE = /^(\d{1,2})([./-])(\d{1,2})\2(\d{4})$/;

const pad2 = (n: number) => String(n).padStart(2, "0");

export function formatIsoDate(date: BirthDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

function existsInCalendar(date: BirthDate): boolean {
  const probe = new Date(Date.UTC(date.year, date.month - 1, date.day));
  return (
    probe.getUTCFullYear() === date.year &&
    probe.getUTCMonth() === date.month - 1 &&
    probe.getUTCDate() === date.day
  );
}

/**
 * Validate a structured date. `source` is what the caller typed, used in the
 * error so the message points at the original input.
 */
export function createBirthDate(
  input: { day: number; month: number; year: number },
  source?: string
): BirthDate {
  const label = source ?? `${input.year}-${input.month}-${input.day}`;
  const result = BirthDateSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const reason = issue
      ? `${issue.path.join(".")} ${issue.message}`.trim()
      : result.error.message;
    throw new InvalidDateError(label, reason);
  }

  const date = result.data;
  if (!existsInCalendar(date)) {
    throw new InvalidDateError(
      label,
      `day ${date.day} does not exist in ${date.year}-${pad2(date.month)}`
    );
  }

  return Object.freeze({ day: date.day, month: date.month, year: date.year });
}

export function parseBirthDate(text: string): BirthDate {
  const cleaned = text.trim();

  const iso = cleaned.match(ISO_DATE);
  if (iso) {
    return createBirthDate(
      { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) },
      text
    );
  }

  const dayFirst = cleaned.match(DAY_FIRST_DATE);
  if (dayFirst) {
    return createBirthDate(
      {
        day: Number(dayFirst[1]),
        month: Number(dayFirst[3]),
        year: Number(dayFirst[4]),
      },
      text
    );
  }

  throw new InvalidDateError(text, "expected YYYY-MM-DD or DD/MM/YYYY");
}
