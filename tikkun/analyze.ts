import { resolveArchetypes } from "./archetypes/resolver/resolveArchetypes.js";
import { CoreConfig } from "./config/loadCoreConfig.js";
import { analyzeBirthDate } from "./numerology/date/analyzeBirthDate.js";
import { mapNameNumbers, NameInput } from "./numerology/name/mapNameNumbers.js";
import {
  BirthDate,
  NumericProfile,
} from "./numerology/schema/numerology.schemas.js";
import { evaluateCanon } from "./report/canon/evaluateCanon.js";
import { TONE_CANON_V0_1 } from "./report/canon/toneCanon.v0_1.js";
import { composeReport, Report } from "./report/composeReport.js";

export type AnalyzeRequest = {
  birthDate: BirthDate;
  fullName?: NameInput;
};

export function buildNumericProfile(
  request: AnalyzeRequest,
  config: Pick<CoreConfig, "letterTable">
): NumericProfile {
  const dateNumbers = analyzeBirthDate(request.birthDate);
  if (request.fullName === undefined) {
    return dateNumbers;
  }
  return { ...dateNumbers, ...mapNameNumbers(request.fullName, config.letterTable) };
}

/**
 * Single entry point: date (and optional name) in, report out. Every error
 * propagates unchanged; nothing is retried or defaulted.
 */
export function analyze(request: AnalyzeRequest, config: CoreConfig): Report {
  const profile = buildNumericProfile(request, config);
  const archetypes = resolveArchetypes(profile, config.knowledgeBase);
  const report = composeReport(archetypes, request.fullName !== undefined);

  const { canon_checks, hard_blocked } = evaluateCanon(report, TONE_CANON_V0_1);
  return {
    ...report,
    canon: {
      version: TONE_CANON_V0_1.version,
      checks: canon_checks,
      hardBlocked: hard_blocked,
    },
  };
}
