import { describe, expect, it } from "vitest";
import { createReportLogHelpers, reportLog } from "../reportLog.js";

describe("reportLog", () => {
  it("writes one JSON line with a timestamp", () => {
    const lines: string[] = [];
    reportLog({ event: "report.analyze.started", has_name: false }, (line) => lines.push(line));

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? "");
    expect(entry.event).toBe("report.analyze.started");
    expect(entry.has_name).toBe(false);
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
  });
});

describe("createReportLogHelpers", () => {
  it("emits typed events", () => {
    const lines: string[] = [];
    const log = createReportLogHelpers({ enabled: true, write: (line) => lines.push(line) });

    log.analyzeSucceeded({ has_name: true, life_path: 11, section_count: 6, hard_blocked: false });
    log.analyzeFailed({ has_name: false, error: new RangeError("bad input") });

    const [succeeded, failed] = lines.map((line) => JSON.parse(line));
    expect(succeeded).toMatchObject({
      event: "report.analyze.succeeded",
      has_name: true,
      life_path: 11,
      section_count: 6,
      hard_blocked: false,
    });
    expect(failed).toMatchObject({
      event: "report.analyze.failed",
      has_name: false,
      error_name: "RangeError",
      error_message: "bad input",
    });
  });

  it("drops everything when disabled", () => {
    const lines: string[] = [];
    const log = createReportLogHelpers({ enabled: false, write: (line) => lines.push(line) });
    log.analyzeStarted({ has_name: true });
    log.configFailed({ data_dir: "/tmp/none", error: new Error("x") });
    expect(lines).toEqual([]);
  });
});
