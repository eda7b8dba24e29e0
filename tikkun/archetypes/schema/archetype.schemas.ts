import { z } from "zod";
import { ReducedValueSchema } from "../../numerology/schema/numerology.schemas.js";

/**
 * Archetype descriptors are DATA: one record per (dimension, number), edited in
 * the JSON files under canon/machine/knowledge, never branched on in code.
 */

export const DIMENSIONS = [
  "life_path",
  "day",
  "month",
  "year",
  "expression",
  "soul",
  "personality",
] as const;

export const DimensionSchema = z.enum(DIMENSIONS);
export type Dimension = z.infer<typeof DimensionSchema>;

// Fixed blending priority for everything that is not the life path.
export const MODIFIER_DIMENSIONS = [
  "day",
  "month",
  "year",
  "expression",
  "soul",
  "personality",
] as const satisfies readonly Dimension[];
export type ModifierDimension = (typeof MODIFIER_DIMENSIONS)[number];

export const NAME_DIMENSIONS = [
  "expression",
  "soul",
  "personality",
] as const satisfies readonly ModifierDimension[];

export const THEMES = [
  "purpose",
  "challenges",
  "emotional_pattern",
  "power_style",
  "relational_style",
  "service_type",
] as const;

export const ThemeSchema = z.enum(THEMES);
export type Theme = z.infer<typeof ThemeSchema>;

const sentence = z
  .string()
  .min(1)
  .max(400)
  .refine((v) => !/\n/.test(v), "newlines are not allowed");

export const ArchetypeDescriptorSchema = z.object({
  purpose: sentence,
  challenges: sentence,
  emotional_pattern: sentence,
  power_style: sentence,
  relational_style: sentence,
  service_type: sentence,
  example: sentence,
});

export type ArchetypeDescriptor = z.infer<typeof ArchetypeDescriptorSchema>;

/** Life-path records also carry the archetype identity and the tikkun practice. */
export const LifePathDescriptorSchema = ArchetypeDescriptorSchema.extend({
  name: sentence,
  keynote: sentence,
  summary: sentence,
  tikkun: sentence,
  healing_keys: z.array(sentence).min(1).max(8),
  reflection_questions: z.array(sentence).min(1).max(8),
});

export type LifePathDescriptor = z.infer<typeof LifePathDescriptorSchema>;

export const LifePathFileSchema = z.object({
  dimension: z.literal("life_path"),
  label: sentence,
  version: z.string().min(1),
  entries: z.array(LifePathDescriptorSchema.extend({ number: ReducedValueSchema })).min(1),
});

export const ModifierFileSchema = z.object({
  dimension: z.enum(MODIFIER_DIMENSIONS),
  label: sentence,
  version: z.string().min(1),
  entries: z.array(ArchetypeDescriptorSchema.extend({ number: ReducedValueSchema })).min(1),
});

export type LifePathFile = z.infer<typeof LifePathFileSchema>;
export type ModifierFile = z.infer<typeof ModifierFileSchema>;

export const THEME_TITLES: Readonly<Record<Theme, string>> = {
  purpose: "Life Purpose",
  challenges: "Recurring Challenges",
  emotional_pattern: "Emotional Patterns",
  power_style: "Power Style",
  relational_style: "Relational Style",
  service_type: "Service Type",
};
