import { z } from "zod";

export const SUPPORTED_ALPHABET = [..."ABCDEFGHIJKLMNOPQRSTUVWXYZ"];

const LetterSchema = z.string().regex(/^[A-Z]$/, "letters must be single A-Z characters");

export const LetterTableFileSchema = z
  .object({
    variant: z.string().min(1),
    values: z.record(LetterSchema, z.number().int().min(1).max(9)),
    vowels: z.array(LetterSchema).min(1),
    // Letters that count as vowels only inside a word with no other vowel (Y in "Lynn").
    fallback_vowels: z.array(LetterSchema).default([]),
  })
  .superRefine((table, ctx) => {
    for (const letter of SUPPORTED_ALPHABET) {
      if (table.values[letter] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["values", letter],
          message: `missing value for ${letter}`,
        });
      }
    }
    table.vowels.forEach((vowel, idx) => {
      if (table.values[vowel] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["vowels", idx],
          message: `vowel ${vowel} has no value`,
        });
      }
    });
    if (new Set(table.vowels).size !== table.vowels.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["vowels"],
        message: "vowels must not repeat",
      });
    }
    table.fallback_vowels.forEach((letter, idx) => {
      if (table.vowels.includes(letter)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fallback_vowels", idx],
          message: `${letter} is already a vowel`,
        });
      }
    });
    if (new Set(table.fallback_vowels).size !== table.fallback_vowels.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["fallback_vowels"],
        message: "fallback vowels must not repeat",
      });
    }
  });

export type LetterTableFile = z.input<typeof LetterTableFileSchema>;

export type LetterValueTable = {
  readonly variant: string;
  readonly values: ReadonlyMap<string, number>;
  readonly vowels: ReadonlySet<string>;
  readonly fallbackVowels: ReadonlySet<string>;
};

export function buildLetterValueTable(file: LetterTableFile): LetterValueTable {
  return Object.freeze({
    variant: file.variant,
    values: new Map(Object.entries(file.values)),
    vowels: new Set(file.vowels),
    fallbackVowels: new Set(file.fallback_vowels ?? []),
  });
}
