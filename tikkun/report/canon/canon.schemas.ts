import { z } from "zod";

export const REPORT_PARTS = ["header", "sections", "practice", "name", "closing"] as const;

export const ReportPartSchema = z.enum(REPORT_PARTS);
export type ReportPart = z.infer<typeof ReportPartSchema>;

const sampleLine = z.string().min(1).max(160);

function compiles(source: string): boolean {
  try {
    new RegExp(source, "i");
    return true;
  } catch {
    return false;
  }
}

/** Whole-word, case-insensitive match on any listed term. */
export const TermsMatcherSchema = z.object({
  match: z.literal("terms"),
  terms: z.array(z.string().min(1).max(40)).min(1),
});

/** Case-insensitive regular expression. */
export const PatternMatcherSchema = z.object({
  match: z.literal("pattern"),
  source: z.string().min(1).refine(compiles, "pattern does not compile"),
});

export const MatcherSchema = z.discriminatedUnion("match", [
  TermsMatcherSchema,
  PatternMatcherSchema,
]);

/** Matchers that only look at the listed report parts. */
export const PartScopeSchema = z.object({
  parts: z.array(ReportPartSchema).min(1),
  matchers: z.array(MatcherSchema).min(1),
});

export const ToneRuleSchema = z.object({
  id: z.string().regex(/^[a-z]+(\.[a-z]+)+$/, "rule ids are dotted lower-case words"),
  summary: sampleLine,
  severity: z.enum(["block", "review", "warn"]),
  scopes: z.array(PartScopeSchema).min(1),
  samples: z.object({
    pass: z.array(sampleLine).min(1),
    fail: z.array(sampleLine).min(1),
  }),
});

export const ToneCanonSchema = z
  .object({
    version: z.string().min(1),
    rules: z.array(ToneRuleSchema).min(1),
  })
  .superRefine((canon, ctx) => {
    const seen = new Set<string>();
    canon.rules.forEach((rule, idx) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rules", idx, "id"],
          message: `duplicate rule id ${rule.id}`,
        });
      }
      seen.add(rule.id);
    });
  });

export type Matcher = z.infer<typeof MatcherSchema>;
export type ToneRule = z.infer<typeof ToneRuleSchema>;
export type ToneCanon = z.infer<typeof ToneCanonSchema>;
