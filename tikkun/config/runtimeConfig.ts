import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "../numerology/errors.js";
import { DEFAULT_LETTER_VARIANT } from "../numerology/name/loadLetterTable.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_DATA_DIR = path.resolve(__dirname, "../canon/machine");

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const RuntimeEnvSchema = z.object({
  TIKKUN_DATA_DIR: optionalText,
  TIKKUN_LETTER_VARIANT: optionalText.pipe(
    z.string().regex(/^[a-z0-9_-]+$/, "must be a bare file name").optional()
  ),
  TIKKUN_LOG_EVENTS: optionalText.pipe(z.enum(["true", "false"]).optional()),
});

export type RuntimeConfig = {
  dataDir: string;
  letterVariant: string;
  logEvents: boolean;
};

export function readRuntimeConfig(
  env: Record<string, string | undefined> = process.env
): RuntimeConfig {
  const result = RuntimeEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError("environment", result.error.message);
  }

  const parsed = result.data;
  return {
    dataDir: parsed.TIKKUN_DATA_DIR
      ? path.resolve(parsed.TIKKUN_DATA_DIR)
      : DEFAULT_DATA_DIR,
    letterVariant: parsed.TIKKUN_LETTER_VARIANT ?? DEFAULT_LETTER_VARIANT,
    logEvents: parsed.TIKKUN_LOG_EVENTS !== "false",
  };
}
