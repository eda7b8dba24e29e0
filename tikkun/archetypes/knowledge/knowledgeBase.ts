import {
  ConfigurationError,
  KnowledgeBaseGapError,
} from "../../numerology/errors.js";
import {
  REDUCED_VALUES,
  ReducedNumber,
  ReducedValue,
} from "../../numerology/schema/numerology.schemas.js";
import {
  ArchetypeDescriptor,
  Dimension,
  LifePathDescriptor,
  LifePathFile,
  MODIFIER_DIMENSIONS,
  ModifierDimension,
  ModifierFile,
} from "../schema/archetype.schemas.js";

export type KnowledgeBase = {
  readonly versions: Readonly<Record<Dimension, string>>;
  readonly labels: Readonly<Record<Dimension, string>>;
  readonly lifePath: ReadonlyMap<ReducedValue, LifePathDescriptor>;
  readonly modifiers: ReadonlyMap<
    ModifierDimension,
    ReadonlyMap<ReducedValue, ArchetypeDescriptor>
  >;
};

export type KnowledgeBaseFiles = {
  lifePath: LifePathFile;
  modifiers: ModifierFile[];
  /** Where the files came from, for error messages. */
  source?: string;
};

function indexEntries<T extends { number: ReducedValue }>(
  entries: T[],
  source: string,
  dimension: Dimension
): Map<ReducedValue, Omit<T, "number">> {
  const index = new Map<ReducedValue, Omit<T, "number">>();
  for (const { number, ...descriptor } of entries) {
    if (index.has(number)) {
      throw new ConfigurationError(
        source,
        `duplicate ${dimension} entry for number ${number}`
      );
    }
    index.set(number, Object.freeze(descriptor));
  }
  return index;
}

/**
 * Build the immutable lookup structure. Shape problems (duplicate files or
 * entries, missing dimension files) are configuration errors; gaps are left
 * to assertKnowledgeBaseComplete.
 */
export function buildKnowledgeBase(files: KnowledgeBaseFiles): KnowledgeBase {
  const source = files.source ?? "knowledge base";
  const modifierFiles = new Map<ModifierDimension, ModifierFile>();

  for (const file of files.modifiers) {
    if (modifierFiles.has(file.dimension)) {
      throw new ConfigurationError(source, `duplicate file for dimension ${file.dimension}`);
    }
    modifierFiles.set(file.dimension, file);
  }

  const modifiers = new Map<ModifierDimension, ReadonlyMap<ReducedValue, ArchetypeDescriptor>>();
  const fileFor = (dimension: ModifierDimension): ModifierFile => {
    const file = modifierFiles.get(dimension);
    if (!file) {
      throw new ConfigurationError(source, `missing file for dimension ${dimension}`);
    }
    return file;
  };

  for (const dimension of MODIFIER_DIMENSIONS) {
    modifiers.set(dimension, indexEntries(fileFor(dimension).entries, source, dimension));
  }

  const describe = (pick: (file: LifePathFile | ModifierFile) => string) =>
    Object.freeze({
      life_path: pick(files.lifePath),
      day: pick(fileFor("day")),
      month: pick(fileFor("month")),
      year: pick(fileFor("year")),
      expression: pick(fileFor("expression")),
      soul: pick(fileFor("soul")),
      personality: pick(fileFor("personality")),
    });

  return Object.freeze({
    versions: describe((file) => file.version),
    labels: describe((file) => file.label),
    lifePath: indexEntries(files.lifePath.entries, source, "life_path"),
    modifiers,
  });
}

export function lookupLifePath(
  kb: KnowledgeBase,
  number: ReducedNumber
): LifePathDescriptor {
  const descriptor = kb.lifePath.get(number.value);
  if (!descriptor) {
    throw new KnowledgeBaseGapError("life_path", number.value);
  }
  return descriptor;
}

export function lookupModifier(
  kb: KnowledgeBase,
  dimension: ModifierDimension,
  number: ReducedNumber
): ArchetypeDescriptor {
  const descriptor = kb.modifiers.get(dimension)?.get(number.value);
  if (!descriptor) {
    throw new KnowledgeBaseGapError(dimension, number.value);
  }
  return descriptor;
}

export function findKnowledgeBaseGaps(
  kb: KnowledgeBase
): Array<{ dimension: Dimension; number: ReducedValue }> {
  const gaps: Array<{ dimension: Dimension; number: ReducedValue }> = [];
  for (const number of REDUCED_VALUES) {
    if (!kb.lifePath.has(number)) gaps.push({ dimension: "life_path", number });
  }
  for (const dimension of MODIFIER_DIMENSIONS) {
    const entries = kb.modifiers.get(dimension);
    for (const number of REDUCED_VALUES) {
      if (!entries?.has(number)) gaps.push({ dimension, number });
    }
  }
  return gaps;
}

export function assertKnowledgeBaseComplete(kb: KnowledgeBase): void {
  const [first] = findKnowledgeBaseGaps(kb);
  if (first) {
    throw new KnowledgeBaseGapError(first.dimension, first.number);
  }
}
