import {
  REDUCED_VALUES,
  ReducedValue,
} from "../../numerology/schema/numerology.schemas.js";
import {
  ArchetypeDescriptor,
  LifePathDescriptor,
  LifePathFile,
  MODIFIER_DIMENSIONS,
  ModifierDimension,
  ModifierFile,
} from "../schema/archetype.schemas.js";

/** Every text reads "<tag> <field>", so assertions can name the exact source. */
export function fixtureDescriptor(tag: string): ArchetypeDescriptor {
  return {
    purpose: `${tag} purpose`,
    challenges: `${tag} challenges`,
    emotional_pattern: `${tag} emotional_pattern`,
    power_style: `${tag} power_style`,
    relational_style: `${tag} relational_style`,
    service_type: `${tag} service_type`,
    example: `${tag} example`,
  };
}

export function fixtureLifePathDescriptor(tag: string): LifePathDescriptor {
  return {
    ...fixtureDescriptor(tag),
    name: `${tag} name`,
    keynote: `${tag} keynote`,
    summary: `${tag} summary`,
    tikkun: `${tag} tikkun`,
    healing_keys: [`${tag} key one`, `${tag} key two`],
    reflection_questions: [`${tag} question?`],
  };
}

export function fixtureLifePathFile(
  numbers: readonly ReducedValue[] = REDUCED_VALUES
): LifePathFile {
  return {
    dimension: "life_path",
    label: "life path",
    version: "test",
    entries: numbers.map((number) => ({
      number,
      ...fixtureLifePathDescriptor(`lp${number}`),
    })),
  };
}

export function fixtureModifierFile(
  dimension: ModifierDimension,
  numbers: readonly ReducedValue[] = REDUCED_VALUES
): ModifierFile {
  return {
    dimension,
    label: `${dimension} label`,
    version: "test",
    entries: numbers.map((number) => ({
      number,
      ...fixtureDescriptor(`${dimension}${number}`),
    })),
  };
}

export function fixtureKnowledgeFiles() {
  return {
    lifePath: fixtureLifePathFile(),
    modifiers: MODIFIER_DIMENSIONS.map((dimension) => fixtureModifierFile(dimension)),
  };
}
