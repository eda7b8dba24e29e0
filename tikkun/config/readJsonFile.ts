import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../numerology/errors.js";

export function listJsonFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new ConfigurationError(dir, "directory does not exist");
  }
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((dirent) => dirent.isFile() && dirent.name.endsWith(".json"))
    .map((dirent) => path.join(dir, dirent.name))
    .sort((a, b) => a.localeCompare(b));
}

export function readJsonFile<S extends z.ZodTypeAny>(
  fullPath: string,
  schema: S
): z.infer<S> {
  let raw: string;
  try {
    raw = fs.readFileSync(fullPath, "utf-8");
  } catch (err: unknown) {
    throw new ConfigurationError(fullPath, `cannot read file (${errorMessage(err)})`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigurationError(fullPath, `invalid JSON (${errorMessage(err)})`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      fullPath,
      `schema validation failed: ${result.error.message}`
    );
  }
  return result.data;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
