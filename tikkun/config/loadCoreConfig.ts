import { createReportLogHelpers, ReportLogHelpers } from "../../logging/reportLog.js";
import { KnowledgeBase } from "../archetypes/knowledge/knowledgeBase.js";
import { loadKnowledgeBase } from "../archetypes/knowledge/loadKnowledgeBase.js";
import { LetterValueTable } from "../numerology/name/letterTable.schemas.js";
import { loadLetterTable } from "../numerology/name/loadLetterTable.js";
import { readRuntimeConfig, RuntimeConfig } from "./runtimeConfig.js";

/** Read-only configuration shared by every analysis in the process. */
export type CoreConfig = {
  readonly dataDir: string;
  readonly letterTable: LetterValueTable;
  readonly knowledgeBase: KnowledgeBase;
};

export function loadCoreConfig(
  options: { runtime?: RuntimeConfig; log?: ReportLogHelpers } = {}
): CoreConfig {
  const runtime = options.runtime ?? readRuntimeConfig();
  const log = options.log ?? createReportLogHelpers({ enabled: runtime.logEvents });

  try {
    const letterTable = loadLetterTable(runtime.dataDir, runtime.letterVariant);
    const knowledgeBase = loadKnowledgeBase(runtime.dataDir);

    log.configLoaded({
      data_dir: runtime.dataDir,
      letter_variant: letterTable.variant,
      knowledge_versions: { ...knowledgeBase.versions },
    });

    return Object.freeze({ dataDir: runtime.dataDir, letterTable, knowledgeBase });
  } catch (err: unknown) {
    if (err instanceof Error) {
      log.configFailed({ data_dir: runtime.dataDir, error: err });
    }
    throw err;
  }
}
