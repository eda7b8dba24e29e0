import { formatReducedNumber } from "../numerology/reduce/reduceNumber.js";
import type { Report } from "./composeReport.js";

const BANNER = "=".repeat(54);

const centered = (text: string) => {
  const pad = Math.max(0, Math.floor((BANNER.length - text.length) / 2));
  return `${" ".repeat(pad)}${text}`;
};

const bullets = (items: string[]) => items.map((item) => `• ${item}`);

/** Plain-text rendering; identical reports give identical strings. */
export function renderReportText(report: Report): string {
  const lines: string[] = [BANNER, centered(report.title), BANNER, ""];

  lines.push(...report.header, "");

  for (const section of report.sections) {
    lines.push(section.title, "-".repeat(section.title.length));
    lines.push(...section.paragraphs);
    if (section.blendingNote) {
      lines.push(`Note: ${section.blendingNote}`);
    }
    lines.push("");
  }

  lines.push(`Your tikkun, in one line: ${report.practice.tikkun}`, "");
  lines.push("Healing keys:", ...bullets(report.practice.healingKeys), "");
  lines.push(
    "Questions for writing, reflection or meditation:",
    ...bullets(report.practice.reflectionQuestions),
    ""
  );

  if (report.nameArchetype) {
    const { label, number, name, summary, tikkun } = report.nameArchetype;
    lines.push(
      "Your name's contribution:",
      ...bullets([
        `Your ${label} ${formatReducedNumber(number)} ties your name to the archetype ${name}.`,
        summary,
        `Tikkun of how you express yourself and relate: ${tikkun}`,
      ]),
      ""
    );
  }

  lines.push(report.closing, BANNER);
  return lines.join("\n");
}
