import { REPORT_PARTS, ToneCanonSchema } from "./canon.schemas.js";

// Reports are reflective maps, never verdicts or health guidance.
export const TONE_CANON_V0_1 = ToneCanonSchema.parse({
  version: "0.1",
  rules: [
    {
      id: "determinism.language",
      summary: "Avoid fate, destiny or guaranteed-outcome language.",
      severity: "review",
      scopes: [
        {
          parts: REPORT_PARTS,
          matchers: [
            {
              match: "terms",
              terms: ["destined", "fated", "guaranteed", "inevitable", "inevitably"],
            },
            { match: "pattern", source: "\\bwill\\s+(always|never|happen)\\b" },
          ],
        },
      ],
      samples: {
        pass: ["This may show up as a pull toward leading."],
        fail: ["You are destined to lead others", "It will always be this way"],
      },
    },
    {
      id: "medical.claims",
      summary: "Block medical or diagnostic claims.",
      severity: "block",
      scopes: [
        {
          parts: REPORT_PARTS,
          matchers: [
            {
              match: "terms",
              terms: ["medical advice", "instead of therapy", "replaces therapy"],
            },
            {
              match: "terms",
              terms: [
                "cure",
                "cures",
                "diagnose",
                "diagnosis",
                "prescription",
                "prescriptions",
                "clinical",
              ],
            },
          ],
        },
      ],
      samples: {
        pass: ["Rest can be part of your practice.", "Security matters to you."],
        fail: ["This number cures anxiety", "Use it instead of therapy"],
      },
    },
    {
      id: "prediction.claims",
      summary: "Flag concrete predictions about events in the reader's life.",
      severity: "warn",
      scopes: [
        {
          // archetype texts, where a concrete event could slip in
          parts: ["sections", "practice", "name"],
          matchers: [
            {
              match: "pattern",
              source: "\\byou\\s+will\\s+(meet|marry|become|win|lose|receive)\\b",
            },
          ],
        },
        {
          parts: ["header", "closing"],
          matchers: [{ match: "pattern", source: "\\byour\\s+(future|fate)\\s+(is|holds)\\b" }],
        },
      ],
      samples: {
        pass: ["You may notice a pull toward partnership."],
        fail: ["You will marry within a year", "Your future holds a move abroad"],
      },
    },
  ],
});
