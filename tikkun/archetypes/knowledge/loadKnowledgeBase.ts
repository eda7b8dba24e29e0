import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../../numerology/errors.js";
import { listJsonFiles, readJsonFile } from "../../config/readJsonFile.js";
import {
  LifePathFile,
  LifePathFileSchema,
  ModifierFile,
  ModifierFileSchema,
} from "../schema/archetype.schemas.js";
import {
  assertKnowledgeBaseComplete,
  buildKnowledgeBase,
  KnowledgeBase,
} from "./knowledgeBase.js";

const KnowledgeFileSchema = z.union([LifePathFileSchema, ModifierFileSchema]);

/**
 * Read every knowledge/*.json file under `dataDir`, validate it, and return a
 * complete, immutable knowledge base. Any gap fails here, at startup.
 */
export function loadKnowledgeBase(dataDir: string): KnowledgeBase {
  const knowledgeDir = path.join(dataDir, "knowledge");
  const files = listJsonFiles(knowledgeDir);

  if (files.length === 0) {
    throw new ConfigurationError(knowledgeDir, "no knowledge files found");
  }

  const lifePathFiles: LifePathFile[] = [];
  const modifiers: ModifierFile[] = [];

  for (const file of files) {
    const parsed = readJsonFile(file, KnowledgeFileSchema);
    if (parsed.dimension === "life_path") {
      lifePathFiles.push(parsed);
    } else {
      modifiers.push(parsed);
    }
  }

  const [lifePath, ...extraLifePath] = lifePathFiles;
  if (!lifePath) {
    throw new ConfigurationError(knowledgeDir, "missing life_path knowledge file");
  }
  if (extraLifePath.length > 0) {
    throw new ConfigurationError(knowledgeDir, "duplicate file for dimension life_path");
  }

  const kb = buildKnowledgeBase({ lifePath, modifiers, source: knowledgeDir });
  assertKnowledgeBaseComplete(kb);
  return kb;
}
