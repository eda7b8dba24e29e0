import {
  EmptyNameError,
  EmptyNameScope,
  UnsupportedCharacterError,
} from "../errors.js";
import { reduceNumber } from "../reduce/reduceNumber.js";
import {
  FullName,
  NameNumbers,
  ReducedNumber,
} from "../schema/numerology.schemas.js";
import { LetterValueTable } from "./letterTable.schemas.js";
import { findUnsupportedCharacter, normalizeFullName } from "./normalizeFullName.js";

export type NameInput = FullName | string;

type ScoredLetter = {
  value: number;
  vowel: boolean;
};

type LetterFilter = (letter: ScoredLetter) => boolean;

function toFullName(name: NameInput, table: LetterValueTable): FullName {
  return typeof name === "string" ? normalizeFullName(name, table) : name;
}

// Prefer the code-point offset into `raw`; words that did not come from `raw`
// are reported against their space-joined form.
function unsupportedLetter(
  name: FullName,
  table: LetterValueTable,
  letter: string,
  offset: number
): UnsupportedCharacterError {
  const inRaw = findUnsupportedCharacter(name.raw, table);
  return inRaw
    ? new UnsupportedCharacterError(name.raw, inRaw.character, inRaw.position)
    : new UnsupportedCharacterError(name.words.join(" "), letter, offset);
}

/**
 * Values every letter and marks vowels word by word: a fallback vowel (Y in
 * the shipped table) is a vowel only in a word with no regular vowel.
 */
function scoreLetters(name: FullName, table: LetterValueTable): ScoredLetter[] {
  const scored: ScoredLetter[] = [];
  let offset = 0;

  for (const word of name.words) {
    const letters = [...word];
    const hasVowel = letters.some((letter) => table.vowels.has(letter));
    letters.forEach((letter, idx) => {
      const value = table.values.get(letter);
      if (value === undefined) {
        throw unsupportedLetter(name, table, letter, offset + idx);
      }
      scored.push({
        value,
        vowel: table.vowels.has(letter) || (!hasVowel && table.fallbackVowels.has(letter)),
      });
    });
    offset += letters.length + 1;
  }

  return scored;
}

function sumLetters(
  name: FullName,
  table: LetterValueTable,
  scope: EmptyNameScope,
  include: LetterFilter
): ReducedNumber {
  const counted = scoreLetters(name, table).filter(include);
  if (counted.length === 0) {
    throw new EmptyNameError(name.raw, scope);
  }
  return reduceNumber(counted.reduce((total, letter) => total + letter.value, 0));
}

export function mapExpression(name: NameInput, table: LetterValueTable): ReducedNumber {
  return sumLetters(toFullName(name, table), table, "name", () => true);
}

/** Heart's desire: vowels only. */
export function mapSoul(name: NameInput, table: LetterValueTable): ReducedNumber {
  return sumLetters(toFullName(name, table), table, "vowels", (letter) => letter.vowel);
}

export function mapPersonality(name: NameInput, table: LetterValueTable): ReducedNumber {
  return sumLetters(toFullName(name, table), table, "consonants", (letter) => !letter.vowel);
}

export function mapNameNumbers(name: NameInput, table: LetterValueTable): NameNumbers {
  const fullName = toFullName(name, table);
  return {
    expression: mapExpression(fullName, table),
    soul: mapSoul(fullName, table),
    personality: mapPersonality(fullName, table),
  };
}
