/**
 * Structured logging for config loading and report runs.
 *
 * One JSON object per line on stderr, so stdout stays reserved for the report.
 */

export type ReportLogEvent =
  | "config.load.succeeded"
  | "config.load.failed"
  | "report.analyze.started"
  | "report.analyze.succeeded"
  | "report.analyze.failed";

export type ReportLogData = {
  event: ReportLogEvent;
  data_dir?: string;
  letter_variant?: string;
  knowledge_versions?: Record<string, string>;
  has_name?: boolean;
  life_path?: number;
  section_count?: number;
  hard_blocked?: boolean;
  error_name?: string;
  error_message?: string;
  [key: string]: unknown;
};

export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => console.error(line);

export function reportLog(data: ReportLogData, write: LogWriter = stderrWriter): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  write(JSON.stringify(logEntry));
}

export type ReportLogHelpers = ReturnType<typeof createReportLogHelpers>;

/**
 * Typed helpers for the events above. A disabled logger drops every event;
 * `write` lets tests capture lines.
 */
export function createReportLogHelpers(options: {
  enabled: boolean;
  write?: LogWriter;
}) {
  const emit = (data: ReportLogData) => {
    if (!options.enabled) return;
    reportLog(data, options.write);
  };

  return {
    configLoaded(params: {
      data_dir: string;
      letter_variant: string;
      knowledge_versions: Record<string, string>;
    }): void {
      emit({
        event: "config.load.succeeded",
        data_dir: params.data_dir,
        letter_variant: params.letter_variant,
        knowledge_versions: params.knowledge_versions,
      });
    },

    configFailed(params: { data_dir: string; error: Error }): void {
      emit({
        event: "config.load.failed",
        data_dir: params.data_dir,
        error_name: params.error.name,
        error_message: params.error.message,
      });
    },

    analyzeStarted(params: { has_name: boolean }): void {
      emit({ event: "report.analyze.started", has_name: params.has_name });
    },

    analyzeSucceeded(params: {
      has_name: boolean;
      life_path: number;
      section_count: number;
      hard_blocked: boolean;
    }): void {
      emit({
        event: "report.analyze.succeeded",
        has_name: params.has_name,
        life_path: params.life_path,
        section_count: params.section_count,
        hard_blocked: params.hard_blocked,
      });
    },

    analyzeFailed(params: { has_name: boolean; error: Error }): void {
      emit({
        event: "report.analyze.failed",
        has_name: params.has_name,
        error_name: params.error.name,
        error_message: params.error.message,
      });
    },
  };
}
