import { formatReducedNumber } from "../../numerology/reduce/reduceNumber.js";
import {
  NumericProfile,
  ReducedNumber,
} from "../../numerology/schema/numerology.schemas.js";
import {
  KnowledgeBase,
  lookupLifePath,
  lookupModifier,
} from "../knowledge/knowledgeBase.js";
import {
  ArchetypeDescriptor,
  LifePathDescriptor,
  MODIFIER_DIMENSIONS,
  ModifierDimension,
  Theme,
  THEME_TITLES,
  THEMES,
} from "../schema/archetype.schemas.js";

export type ModifierContribution = {
  dimension: ModifierDimension;
  label: string;
  number: ReducedNumber;
  descriptor: ArchetypeDescriptor;
  /** The core archetype of the same number: its name, keynote and tikkun. */
  archetype: LifePathDescriptor;
};

export type ModifierFragment = {
  dimension: ModifierDimension;
  number: ReducedNumber;
  text: string;
};

export type ThemeBlend = {
  theme: Theme;
  primary: string;
  fragments: ModifierFragment[];
  /** Present only when some modifier number differs from the life path. */
  blendingNote?: string;
};

export type ArchetypeProfile = {
  numbers: NumericProfile;
  primary: {
    number: ReducedNumber;
    label: string;
    descriptor: LifePathDescriptor;
  };
  modifiers: ModifierContribution[];
  themes: ThemeBlend[];
};

export function profileNumberFor(
  profile: NumericProfile,
  dimension: ModifierDimension
): ReducedNumber | undefined {
  switch (dimension) {
    case "day":
      return profile.dayEnergy;
    case "month":
      return profile.monthEnergy;
    case "year":
      return profile.yearEnergy;
    case "expression":
      return profile.expression;
    case "soul":
      return profile.soul;
    case "personality":
      return profile.personality;
  }
}

export function joinLabels(items: string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

function describeNumber(label: string, number: ReducedNumber): string {
  return `${label} ${formatReducedNumber(number)}`;
}

function blendTheme(
  theme: Theme,
  primary: ArchetypeProfile["primary"],
  modifiers: ModifierContribution[]
): ThemeBlend {
  const fragments = modifiers.map((modifier) => ({
    dimension: modifier.dimension,
    number: modifier.number,
    text: `Also shaped by your ${describeNumber(modifier.label, modifier.number)}: ${modifier.descriptor[theme]}`,
  }));

  const differing = modifiers.filter(
    (modifier) => modifier.number.value !== primary.number.value
  );

  const blend: ThemeBlend = {
    theme,
    primary: primary.descriptor[theme],
    fragments,
  };

  if (differing.length > 0) {
    const lead = describeNumber(primary.label, primary.number);
    const others = joinLabels(
      differing.map((modifier) => describeNumber(modifier.label, modifier.number))
    );
    const verb = differing.length === 1 ? "adds its own thread" : "add their own threads";
    blend.blendingNote = `Your ${lead} leads on ${THEME_TITLES[theme].toLowerCase()}; ${others} ${verb} without replacing it.`;
  }

  return blend;
}

/**
 * Life path is always primary. Every present dimension contributes, in the
 * fixed order day, month, year, expression, soul, personality; absent name
 * dimensions are skipped, never defaulted.
 */
export function resolveArchetypes(
  profile: NumericProfile,
  kb: KnowledgeBase
): ArchetypeProfile {
  const primary = {
    number: profile.lifePath,
    label: kb.labels.life_path,
    descriptor: lookupLifePath(kb, profile.lifePath),
  };

  const modifiers: ModifierContribution[] = [];
  for (const dimension of MODIFIER_DIMENSIONS) {
    const number = profileNumberFor(profile, dimension);
    if (!number) continue;
    modifiers.push({
      dimension,
      label: kb.labels[dimension],
      number,
      descriptor: lookupModifier(kb, dimension, number),
      archetype: lookupLifePath(kb, number),
    });
  }

  return {
    numbers: profile,
    primary,
    modifiers,
    themes: THEMES.map((theme) => blendTheme(theme, primary, modifiers)),
  };
}
