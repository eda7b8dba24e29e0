export { analyze, buildNumericProfile } from "./analyze.js";
export type { AnalyzeRequest } from "./analyze.js";

export { loadCoreConfig } from "./config/loadCoreConfig.js";
export type { CoreConfig } from "./config/loadCoreConfig.js";
export { readRuntimeConfig, DEFAULT_DATA_DIR } from "./config/runtimeConfig.js";
export type { RuntimeConfig } from "./config/runtimeConfig.js";

export {
  reduceNumber,
  reduceToDigit,
  formatReducedNumber,
} from "./numerology/reduce/reduceNumber.js";
export { analyzeBirthDate } from "./numerology/date/analyzeBirthDate.js";
export { createBirthDate, parseBirthDate, formatIsoDate } from "./numerology/date/birthDate.js";
export { normalizeFullName } from "./numerology/name/normalizeFullName.js";
export {
  mapExpression,
  mapSoul,
  mapPersonality,
  mapNameNumbers,
} from "./numerology/name/mapNameNumbers.js";
export type {
  BirthDate,
  FullName,
  NumericProfile,
  ReducedNumber,
} from "./numerology/schema/numerology.schemas.js";

export { resolveArchetypes } from "./archetypes/resolver/resolveArchetypes.js";
export type { ArchetypeProfile } from "./archetypes/resolver/resolveArchetypes.js";

export { composeReport } from "./report/composeReport.js";
export type { Report, ReportSection } from "./report/composeReport.js";
export { renderReportText } from "./report/renderReportText.js";

export {
  InvalidValueError,
  InvalidDateError,
  EmptyNameError,
  UnsupportedCharacterError,
  KnowledgeBaseGapError,
  ConfigurationError,
  ProfileMismatchError,
  isInputError,
} from "./numerology/errors.js";
