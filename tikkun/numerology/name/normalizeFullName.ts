import { EmptyNameError, UnsupportedCharacterError } from "../errors.js";
import { FullName } from "../schema/numerology.schemas.js";
import { LetterValueTable } from "./letterTable.schemas.js";

// Punctuation that commonly appears inside names and carries no value.
const IGNORED_SEPARATORS = new Set(["-", "'", "’", ".", ","]);

const WHITESPACE = /^\s$/u;
const COMBINING_MARKS = /\p{M}/gu;

export type UnsupportedCharacter = {
  character: string;
  position: number;
};

// A lone combining mark (already-decomposed input) folds to nothing.
function foldToLetters(char: string): string {
  return char.normalize("NFKD").replace(COMBINING_MARKS, "").toUpperCase();
}

function isSeparator(char: string): boolean {
  return WHITESPACE.test(char) || IGNORED_SEPARATORS.has(char);
}

/** First character of `raw` the table cannot value, by code-point offset. */
export function findUnsupportedCharacter(
  raw: string,
  table: LetterValueTable
): UnsupportedCharacter | undefined {
  const chars = Array.from(raw);
  const position = chars.findIndex(
    (char) =>
      !isSeparator(char) &&
      [...foldToLetters(char)].some((letter) => !table.values.has(letter))
  );
  const character = chars[position];
  return character === undefined ? undefined : { character, position };
}

/**
 * Upper-case, strip diacritics, split on whitespace. Positions in errors are
 * 0-based code-point offsets into `raw`.
 */
export function normalizeFullName(raw: string, table: LetterValueTable): FullName {
  const words: string[] = [];
  let current = "";

  const flush = () => {
    if (current.length > 0) {
      words.push(current);
      current = "";
    }
  };

  Array.from(raw).forEach((char, position) => {
    if (WHITESPACE.test(char)) {
      flush();
      return;
    }
    if (IGNORED_SEPARATORS.has(char)) return;

    for (const letter of foldToLetters(char)) {
      if (!table.values.has(letter)) {
        throw new UnsupportedCharacterError(raw, char, position);
      }
      current += letter;
    }
  });
  flush();

  if (words.length === 0) {
    throw new EmptyNameError(raw);
  }

  return Object.freeze({ raw, words: Object.freeze(words) });
}
