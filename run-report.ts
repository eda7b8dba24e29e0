import "dotenv/config";

import { createReportLogHelpers } from "./logging/reportLog.js";
import { analyze } from "./tikkun/analyze.js";
import { loadCoreConfig } from "./tikkun/config/loadCoreConfig.js";
import { readRuntimeConfig } from "./tikkun/config/runtimeConfig.js";
import { parseBirthDate } from "./tikkun/numerology/date/birthDate.js";
import { isInputError } from "./tikkun/numerology/errors.js";
import { renderReportText } from "./tikkun/report/renderReportText.js";

const USAGE =
  'Usage: tsx run-report.ts <birth-date YYYY-MM-DD | DD/MM/YYYY> [--name "<full name>"] [--json]';

type ParsedArgs = {
  birth_date: string;
  full_name?: string;
  json: boolean;
};

export function parseArgs(argv: string[]): ParsedArgs {
  const [, , birth_date, ...rest] = argv;
  if (!birth_date || birth_date.startsWith("--")) {
    throw new Error(USAGE);
  }

  let full_name: string | undefined;
  let json = false;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (token === "--name") {
      const val = rest[i + 1];
      if (val === undefined || val.startsWith("--")) {
        throw new Error("--name needs a value");
      }
      full_name = val;
      i += 1;
    } else if (token === "--json") {
      json = true;
    } else {
      throw new Error(`Unknown argument ${token}\n${USAGE}`);
    }
  }

  return { birth_date, full_name, json };
}

function main(): number {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv);
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    return 2;
  }

  const runtime = readRuntimeConfig();
  const log = createReportLogHelpers({ enabled: runtime.logEvents });
  const config = loadCoreConfig({ runtime, log });

  const has_name = args.full_name !== undefined;
  log.analyzeStarted({ has_name });

  try {
    const report = analyze(
      { birthDate: parseBirthDate(args.birth_date), fullName: args.full_name },
      config
    );
    log.analyzeSucceeded({
      has_name,
      life_path: report.numbers.lifePath.value,
      section_count: report.sections.length,
      hard_blocked: report.canon?.hardBlocked ?? false,
    });
    console.log(args.json ? JSON.stringify(report, null, 2) : renderReportText(report));
    return 0;
  } catch (err: unknown) {
    if (err instanceof Error) {
      log.analyzeFailed({ has_name, error: err });
    }
    if (isInputError(err)) {
      console.error(`${err.name}: ${err.message}`);
      return 2;
    }
    throw err;
  }
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    try {
      process.exitCode = main();
    } catch (err: unknown) {
      console.error(err);
      process.exitCode = 1;
    }
  }
}
