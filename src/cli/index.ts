import { loadConfig } from "../config";
import { runDownload, runExport, runExtract, runPipeline, runStatus, runUpdate } from "../core/commands";
import { YearMonth } from "../dates";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createSink } from "../sink";
import { createColumnarStore } from "../store";

export type CommandName = "download" | "extract" | "run" | "update" | "status" | "export";

export interface ParsedCliArgs {
  command: CommandName;
  ignoreHttpsErrors: boolean;
  start?: YearMonth;
  maxDocs?: number;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  migration-reports <command> [options]

Commands:
  download   Fetch missing monthly reports from the start month to the last completed month
  extract    Re-extract every downloaded report and rebuild all tables
  run        download, then extract
  update     Fetch the last completed month and refresh recent reports in place
  status     Show table sizes, date ranges and monthly coverage
  export     Write every table as CSV

Options:
  --config <path>        Optional path to JSON config file
  --start <YYYY-MM>      First month to download (default: configured start)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --max-docs <n>         Limit documents processed by extract/run
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (!raw) {
    return undefined;
  }

  if (
    raw === "download" ||
    raw === "extract" ||
    raw === "run" ||
    raw === "update" ||
    raw === "status" ||
    raw === "export"
  ) {
    return raw;
  }

  return undefined;
}

function parseStart(raw: string | undefined): YearMonth | undefined {
  const match = raw ? /^(\d{4})-(\d{2})$/.exec(raw) : null;
  if (!match) {
    return undefined;
  }
  const month = Number(match[2]);
  return month >= 1 && month <= 12 ? { year: Number(match[1]), month } : undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const maxDocsRaw = optionValue(argv, "--max-docs");
  const maxDocsParsed = maxDocsRaw ? Number.parseInt(maxDocsRaw, 10) : undefined;
  return {
    command,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    start: parseStart(optionValue(argv, "--start")),
    maxDocs: Number.isFinite(maxDocsParsed) ? maxDocsParsed : undefined,
    configPath: optionValue(argv, "--config"),
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(process.env.LOG_LEVEL) });
  const store = createColumnarStore(config, logger.child("store"));
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const context = { runId, config, store, sink, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    start: parsed.start,
    maxDocs: parsed.maxDocs,
  });

  try {
    switch (parsed.command) {
      case "download":
        await runDownload({ ...context, logger: logger.child("download") }, parsed.start);
        break;
      case "extract":
        await runExtract({ ...context, logger: logger.child("extract") }, parsed.maxDocs);
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") }, { start: parsed.start, maxDocs: parsed.maxDocs });
        break;
      case "update":
        await runUpdate({ ...context, logger: logger.child("update") });
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      case "export":
        await runExport({ ...context, logger: logger.child("export") });
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
