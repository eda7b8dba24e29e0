import path from "node:path";
import { readJsonFile } from "../../config/readJsonFile.js";
import {
  buildLetterValueTable,
  LetterTableFileSchema,
  LetterValueTable,
} from "./letterTable.schemas.js";

export const DEFAULT_LETTER_VARIANT = "pythagorean";

export function loadLetterTable(
  dataDir: string,
  variant: string = DEFAULT_LETTER_VARIANT
): LetterValueTable {
  const file = readJsonFile(
    path.join(dataDir, "letters", `${variant}.json`),
    LetterTableFileSchema
  );
  return buildLetterValueTable(file);
}
