import {
  ArchetypeProfile,
  joinLabels,
  ModifierContribution,
} from "../archetypes/resolver/resolveArchetypes.js";
import {
  NAME_DIMENSIONS,
  Theme,
  THEME_TITLES,
} from "../archetypes/schema/archetype.schemas.js";
import {
  formatReducedNumber,
  sumDigits,
} from "../numerology/reduce/reduceNumber.js";
import { ProfileMismatchError } from "../numerology/errors.js";
import {
  NumericProfile,
  ReducedNumber,
} from "../numerology/schema/numerology.schemas.js";
import type { CanonCheck } from "./canon/evaluateCanon.js";

export const REPORT_TITLE = "Archetype and Tikkun Report";

export type ReportSection = {
  key: Theme;
  title: string;
  /** Primary text, then modifier fragments in dimension order, then the example. */
  paragraphs: string[];
  text: string;
  blendingNote?: string;
};

export type ReportPractice = {
  tikkun: string;
  healingKeys: string[];
  reflectionQuestions: string[];
};

/** Archetype of the expression number: how the name carries the plan. */
export type ReportNameArchetype = {
  number: ReducedNumber;
  label: string;
  name: string;
  summary: string;
  tikkun: string;
};

export type Report = {
  title: string;
  dateOnly: boolean;
  numbers: NumericProfile;
  header: string[];
  sections: ReportSection[];
  practice: ReportPractice;
  nameArchetype?: ReportNameArchetype;
  closing: string;
  canon?: {
    version: string;
    checks: CanonCheck[];
    hardBlocked: boolean;
  };
};

const FRAMING_LINE =
  "Read this as a symbolic map for reflection, not as a fixed verdict about who you are.";
const DATE_ONLY_LINE =
  "This report is date-only: no name was given, so expression, soul and personality numbers are not part of it.";
const CLOSING_WITH_NAME =
  "The date shows the underlying plan of the soul; the name shows the style in which you live that plan day to day.";
const CLOSING_DATE_ONLY =
  "The date shows the underlying plan of the soul; a full name would add the style in which you live that plan day to day.";

const isNameModifier = (modifier: ModifierContribution) =>
  NAME_DIMENSIONS.some((d) => d === modifier.dimension);

function describeEnergy(
  modifier: ModifierContribution,
  numbers: ArchetypeProfile["numbers"]
): string {
  const { day, month, year, yearDigitSum } = numbers.dateBreakdown;
  const source =
    modifier.dimension === "day"
      ? `Day ${day}`
      : modifier.dimension === "month"
        ? `Month ${month}`
        : `Year ${year} (digit sum ${yearDigitSum})`;
  return `${source}: your ${modifier.label} ${formatReducedNumber(modifier.number)} resonates with ${modifier.archetype.keynote}.`;
}

function buildHeader(profile: ArchetypeProfile, hasName: boolean): string[] {
  const { primary, modifiers, numbers } = profile;
  const { day, month, year, yearDigitSum, dateDigitSum } = numbers.dateBreakdown;
  const lifePath = formatReducedNumber(primary.number);

  const header = [
    `Your ${primary.label} ${lifePath}: ${primary.descriptor.name}.`,
    FRAMING_LINE,
  ];
  if (!hasName) header.push(DATE_ONLY_LINE);

  header.push(
    `Date digits: ${sumDigits(day)} (day ${day}) + ${sumDigits(month)} (month ${month}) + ${yearDigitSum} (year ${year}) = ${dateDigitSum}, which reduces to ${primary.label} ${lifePath}.`
  );

  const describe = (items: typeof modifiers) =>
    joinLabels(items.map((m) => `${m.label} ${formatReducedNumber(m.number)}`));

  const dateModifiers = modifiers.filter((m) => !isNameModifier(m));
  const nameModifiers = modifiers.filter(isNameModifier);

  header.push(`Date energies: ${describe(dateModifiers)}.`);
  header.push(...dateModifiers.map((m) => describeEnergy(m, numbers)));
  if (nameModifiers.length > 0) {
    header.push(`Name numbers: ${describe(nameModifiers)}.`);
  }
  header.push(primary.descriptor.summary);

  return header;
}

/**
 * Deterministic: the same profile and flag always give identical output.
 * Name-derived fragments are absent from a date-only profile by construction;
 * a flag that contradicts the profile is a caller bug.
 */
export function composeReport(profile: ArchetypeProfile, hasName: boolean): Report {
  const carriesName = profile.modifiers.some(isNameModifier);
  if (carriesName !== hasName) {
    throw new ProfileMismatchError(hasName, carriesName);
  }

  const example = profile.primary.descriptor.example;
  const sections: ReportSection[] = profile.themes.map((blend) => {
    const paragraphs = [
      blend.primary,
      ...blend.fragments.map((fragment) => fragment.text),
      `Example: ${example}`,
    ];
    const section: ReportSection = {
      key: blend.theme,
      title: THEME_TITLES[blend.theme],
      paragraphs,
      text: paragraphs.join("\n"),
    };
    if (blend.blendingNote) section.blendingNote = blend.blendingNote;
    return section;
  });

  const descriptor = profile.primary.descriptor;

  const report: Report = {
    title: REPORT_TITLE,
    dateOnly: !hasName,
    numbers: profile.numbers,
    header: buildHeader(profile, hasName),
    sections,
    practice: {
      tikkun: descriptor.tikkun,
      healingKeys: [...descriptor.healing_keys],
      reflectionQuestions: [...descriptor.reflection_questions],
    },
    closing: hasName ? CLOSING_WITH_NAME : CLOSING_DATE_ONLY,
  };

  const expression = profile.modifiers.find((m) => m.dimension === "expression");
  if (expression) {
    report.nameArchetype = {
      number: expression.number,
      label: expression.label,
      name: expression.archetype.name,
      summary: expression.archetype.summary,
      tikkun: expression.archetype.tikkun,
    };
  }

  return report;
}
