import { z } from "zod";

export const SINGLE_DIGITS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;
export const MASTER_NUMBERS = [11, 22, 33] as const;
export const REDUCED_VALUES = [...SINGLE_DIGITS, ...MASTER_NUMBERS] as const;

export type SingleDigit = (typeof SINGLE_DIGITS)[number];
export type MasterNumber = (typeof MASTER_NUMBERS)[number];
export type ReducedValue = SingleDigit | MasterNumber;

export type ReducedNumber =
  | { readonly value: SingleDigit; readonly isMaster: false }
  | { readonly value: MasterNumber; readonly isMaster: true };

export const ReducedValueSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
  z.literal(7),
  z.literal(8),
  z.literal(9),
  z.literal(11),
  z.literal(22),
  z.literal(33),
]);

export const BIRTH_YEAR_MIN = 1900;
export const BIRTH_YEAR_MAX = 2100;

export const BirthDateSchema = z.object({
  day: z.number().int().min(1).max(31),
  month: z.number().int().min(1).max(12),
  year: z.number().int().min(BIRTH_YEAR_MIN).max(BIRTH_YEAR_MAX),
});

export type BirthDate = Readonly<z.infer<typeof BirthDateSchema>>;

export type FullName = {
  readonly raw: string;
  /** Upper-cased, diacritic-free words containing only table letters. */
  readonly words: readonly string[];
};

export type DateBreakdown = {
  readonly day: number;
  readonly month: number;
  readonly year: number;
  readonly yearDigitSum: number;
  readonly dateDigitSum: number;
};

export type DateNumbers = {
  readonly lifePath: ReducedNumber;
  readonly dayEnergy: ReducedNumber;
  readonly monthEnergy: ReducedNumber;
  readonly yearEnergy: ReducedNumber;
  readonly dateBreakdown: DateBreakdown;
};

export type NameNumbers = {
  readonly expression: ReducedNumber;
  readonly soul: ReducedNumber;
  readonly personality: ReducedNumber;
};

export type NumericProfile = DateNumbers & Partial<NameNumbers>;
