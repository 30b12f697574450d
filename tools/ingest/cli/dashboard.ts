import { parseArgs } from "util";
import { writeJsonAtomic } from "../lib/json.js";
import { validateSnapshot } from "../lib/validation.js";
import { loadConfig } from "../pipeline/config.js";
import { ConfigError, isDataUnavailable } from "../pipeline/errors.js";
import { initializeEventSink } from "../pipeline/events.js";
import { Logger } from "../pipeline/logger.js";
import { ReservoirDataService } from "../pipeline/service.js";
import { renderPrettySnapshot } from "./render.js";

interface CliOptions {
  url?: string;
  date?: string;
  dam?: string;
  format: "pretty" | "json";
  out?: string;
  verbose?: boolean;
  eventFile?: string;
}

function parseCliArgs(argv: string[]): CliOptions {
  const parsed = parseArgs({
    args: argv,
    options: {
      url: { type: "string" },
      date: { type: "string" },
      dam: { type: "string" },
      format: { type: "string", default: "pretty" },
      out: { type: "string" },
      verbose: { type: "boolean" },
      "event-file": { type: "string" },
    },
    allowPositionals: false,
  });

  const format = parsed.values.format;
  if (format !== "pretty" && format !== "json") {
    throw new ConfigError(`--format must be "pretty" or "json", got "${format}"`);
  }

  return {
    url: parsed.values.url,
    date: parsed.values.date,
    dam: parsed.values.dam,
    format,
    out: parsed.values.out,
    verbose: parsed.values.verbose,
    eventFile: parsed.values["event-file"],
  };
}

function createRunId(): string {
  return `dashboard-${new Date().toISOString().replace(/[.:]/g, "-")}`;
}

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));
  const config = loadConfig(process.env, {
    sourceUrl: cli.url,
    verbose: cli.verbose,
    eventFile: cli.eventFile,
  });

  initializeEventSink({
    runId: createRunId(),
    format: config.logFormat,
    verbose: config.verbose,
    terminal: true,
    eventFilePath: config.eventFile,
  });

  const logger = new Logger();
  const service = new ReservoirDataService({ config, logger });

  try {
    const snapshot = await service.getSnapshot({ date: cli.date, entity: cli.dam });

    if (cli.out) {
      const issues = validateSnapshot(snapshot, cli.out);
      if (issues.length > 0) {
        for (const issue of issues) {
          console.error(`FAIL ${issue.file}`);
          for (const message of issue.messages) {
            console.error(`  ${message}`);
          }
        }
        return 1;
      }
      writeJsonAtomic(cli.out, snapshot);
    }

    console.log(
      cli.format === "json" ? JSON.stringify(snapshot, null, 2) : renderPrettySnapshot(snapshot)
    );
    return 0;
  } catch (error) {
    if (isDataUnavailable(error)) {
      console.error(`Data unavailable: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
