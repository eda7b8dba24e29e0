import type { Report } from "../composeReport.js";
import { Matcher, ReportPart, ToneCanon, ToneRule } from "./canon.schemas.js";

type CanonStatus = "pass" | "fail";

export type CanonCheck = {
  rule_id: string;
  severity: ToneRule["severity"];
  status: CanonStatus;
  /** Part and text of the first hit, in scope order. */
  part?: ReportPart;
  evidence?: string;
};

export type CanonResult = {
  canon_checks: CanonCheck[];
  hard_blocked: boolean;
};

type Hit = { part: ReportPart; text: string };

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function collectSnippets(report: Report): Record<ReportPart, string[]> {
  const name = report.nameArchetype;
  return {
    header: [...report.header],
    sections: report.sections.flatMap((section) => [
      ...section.paragraphs,
      ...(section.blendingNote ? [section.blendingNote] : []),
    ]),
    practice: [
      report.practice.tikkun,
      ...report.practice.healingKeys,
      ...report.practice.reflectionQuestions,
    ],
    name: name ? [name.name, name.summary, name.tikkun] : [],
    closing: [report.closing],
  };
}

export function matchesText(text: string, matcher: Matcher): boolean {
  if (matcher.match === "terms") {
    return matcher.terms.some((term) =>
      new RegExp(`\\b${escapeRegExp(term)}\\b`, "i").test(text)
    );
  }
  return new RegExp(matcher.source, "i").test(text);
}

/** True when any matcher of the rule, in any scope, matches the text. */
export function ruleMatches(rule: ToneRule, text: string): boolean {
  return rule.scopes.some((scope) => scope.matchers.some((m) => matchesText(text, m)));
}

function firstHit(
  rule: ToneRule,
  snippetsByPart: Record<ReportPart, string[]>
): Hit | undefined {
  for (const scope of rule.scopes) {
    for (const part of scope.parts) {
      const text = snippetsByPart[part].find((snippet) =>
        scope.matchers.some((m) => matchesText(snippet, m))
      );
      if (text !== undefined) return { part, text };
    }
  }
  return undefined;
}

export function evaluateCanon(report: Report, canon: ToneCanon): CanonResult {
  const snippetsByPart = collectSnippets(report);
  const checks: CanonCheck[] = [];
  let hardBlocked = false;

  for (const rule of canon.rules) {
    const hit = firstHit(rule, snippetsByPart);
    const check: CanonCheck = {
      rule_id: rule.id,
      severity: rule.severity,
      status: hit ? "fail" : "pass",
    };
    if (hit) {
      check.part = hit.part;
      check.evidence = hit.text;
      if (rule.severity === "block") hardBlocked = true;
    }
    checks.push(check);
  }

  return { canon_checks: checks, hard_blocked: hardBlocked };
}
