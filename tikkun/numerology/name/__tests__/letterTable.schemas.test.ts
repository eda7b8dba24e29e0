import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { DEFAULT_DATA_DIR } from "../../../config/runtimeConfig.js";
import { ConfigurationError } from "../../errors.js";
import {
  buildLetterValueTable,
  LetterTableFileSchema,
  SUPPORTED_ALPHABET,
} from "../letterTable.schemas.js";
import { loadLetterTable } from "../loadLetterTable.js";

const fullValues = Object.fromEntries(
  SUPPORTED_ALPHABET.map((letter, idx) => [letter, (idx % 9) + 1])
);

describe("LetterTableFileSchema", () => {
  it("accepts a complete table", () => {
    const parsed = LetterTableFileSchema.safeParse({
      variant: "test",
      values: fullValues,
      vowels: ["A", "E"],
    });
    expect(parsed.success).toBe(true);
  });

  it("rejects a table with a missing letter", () => {
    const { Q: _dropped, ...partial } = fullValues;
    const parsed = LetterTableFileSchema.safeParse({
      variant: "test",
      values: partial,
      vowels: ["A"],
    });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0]?.message).toBe("missing value for Q");
    }
  });

  it("rejects values outside 1..9", () => {
    const parsed = LetterTableFileSchema.safeParse({
      variant: "test",
      values: { ...fullValues, A: 10 },
      vowels: ["A"],
    });
    expect(parsed.success).toBe(false);
  });

  it("defaults fallback vowels to none", () => {
    const parsed = LetterTableFileSchema.parse({
      variant: "test",
      values: fullValues,
      vowels: ["A"],
    });
    expect(parsed.fallback_vowels).toEqual([]);
  });

  it("rejects a fallback vowel that is already a vowel", () => {
    const parsed = LetterTableFileSchema.safeParse({
      variant: "test",
      values: fullValues,
      vowels: ["A", "Y"],
      fallback_vowels: ["Y"],
    });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0]?.message).toBe("Y is already a vowel");
    }
  });

  it("rejects repeated vowels", () => {
    const parsed = LetterTableFileSchema.safeParse({
      variant: "test",
      values: fullValues,
      vowels: ["A", "A"],
    });
    expect(parsed.success).toBe(false);
  });
});

describe("loadLetterTable", () => {
  const tmpDirs: string[] = [];

  afterAll(() => {
    tmpDirs.forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
  });

  it("loads the shipped pythagorean table", () => {
    const table = loadLetterTable(DEFAULT_DATA_DIR);
    expect(table.variant).toBe("pythagorean");
    expect(table.values.size).toBe(26);
    expect([...table.vowels].sort()).toEqual(["A", "E", "I", "O", "U"]);
    expect(table.vowels.has("Y")).toBe(false);
    expect([...table.fallbackVowels]).toEqual(["Y"]);

    const expected: Record<string, number> = {
      A: 1, J: 1, S: 1,
      B: 2, K: 2, T: 2,
      C: 3, L: 3, U: 3,
      D: 4, M: 4, V: 4,
      E: 5, N: 5, W: 5,
      F: 6, O: 6, X: 6,
      G: 7, P: 7, Y: 7,
      H: 8, Q: 8, Z: 8,
      I: 9, R: 9,
    };
    for (const [letter, value] of Object.entries(expected)) {
      expect(table.values.get(letter)).toBe(value);
    }
  });

  it("fails with a configuration error for an unknown variant", () => {
    expect(() => loadLetterTable(DEFAULT_DATA_DIR, "no-such-variant")).toThrow(
      ConfigurationError
    );
  });

  it("fails with a configuration error for a malformed file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "letters-"));
    tmpDirs.push(dir);
    fs.mkdirSync(path.join(dir, "letters"));
    fs.writeFileSync(
      path.join(dir, "letters", "broken.json"),
      JSON.stringify({ variant: "broken", values: { A: 1 }, vowels: ["A"] })
    );
    expect(() => loadLetterTable(dir, "broken")).toThrow(ConfigurationError);
  });
});

describe("buildLetterValueTable", () => {
  it("indexes values and vowels", () => {
    const table = buildLetterValueTable({
      variant: "test",
      values: fullValues,
      vowels: ["A"],
      fallback_vowels: ["Y"],
    });
    expect(table.values.get("J")).toBe(1);
    expect(table.vowels.has("A")).toBe(true);
    expect(table.fallbackVowels.has("Y")).toBe(true);
    expect(Object.isFrozen(table)).toBe(true);
  });
});
