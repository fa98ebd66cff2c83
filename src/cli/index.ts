import { loadConfig, toList, type AppConfig } from "../config";
import {
  runAuto,
  runBackfill,
  runDailyReport,
  runPipeline,
  runReport,
  runStatus,
  type CommandContext,
} from "../core/commands";
import { parseIsoDate } from "../core/dates";
import { errorMessage, ValidationError } from "../core/errors";
import { createLedger } from "../ledger";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { ALL_SOURCE_IDS } from "../sources";
import type { RunSummary } from "../types";

export type CommandName =
  | "scrape"
  | "analyze"
  | "both"
  | "report"
  | "daily-report"
  | "backfill-urls"
  | "auto"
  | "status";

export interface ParsedCliArgs {
  command: CommandName;
  date?: string;
  limit?: number;
  sourceIds?: string[];
  force: boolean;
  ignoreHttpsErrors: boolean;
  configPath?: string;
}

const COMMANDS: readonly CommandName[] = [
  "scrape",
  "analyze",
  "both",
  "report",
  "daily-report",
  "backfill-urls",
  "auto",
  "status",
];

const DATE_COMMANDS: readonly CommandName[] = ["scrape", "both", "report", "daily-report"];

const HELP_TEXT = `
Usage:
  opinion-ledger <command> [argument] [options]

Commands:
  scrape [YYYY-MM-DD]        Discover and download opinions (default: previous business day)
  analyze [limit]            Analyze downloaded opinions that have no analysis yet
  both [YYYY-MM-DD]          scrape, then analyze
  report [YYYY-MM-DD]        Write a Markdown report of analyses (all dates when omitted)
  daily-report [YYYY-MM-DD]  Write the report for one date (default: previous business day)
  backfill-urls              Fill missing direct document links from the docket listings
  auto                       Retry pending downloads, run both for the previous business day, write its report
  status                     Show ledger counts and recent runs

Options:
  --config <path>          Optional path to JSON config file
  --sources <ids>          Comma-separated source ids, e.g. coa01,coa05
  --force                  Re-analyze opinions that already have an analysis (analyze/both)
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -h, --help               Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function parseLimit(raw: string): number {
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got '${raw}'`);
  }
  return limit;
}

function parseSources(raw: string | undefined): string[] {
  const sourceIds = toList(raw, []);
  if (sourceIds.length === 0) {
    throw new ValidationError("--sources needs a comma-separated list of source ids");
  }
  const unknown = sourceIds.filter((sourceId) => !ALL_SOURCE_IDS.includes(sourceId));
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown source id(s): ${unknown.join(", ")}`);
  }
  return sourceIds;
}

/** Throws `ValidationError` for a malformed argument; returns "help" for help or an unknown command. */
export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const parsed: ParsedCliArgs = { command, force: false, ignoreHttpsErrors: false };
  const positionals: string[] = [];
  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    switch (arg) {
      case "--config":
        parsed.configPath = argv[index + 1];
        if (!parsed.configPath) {
          throw new ValidationError("--config needs a path");
        }
        index += 1;
        break;
      case "--sources":
        parsed.sourceIds = parseSources(argv[index + 1]);
        index += 1;
        break;
      case "--force":
        parsed.force = true;
        break;
      case "--ignore-https-errors":
        parsed.ignoreHttpsErrors = true;
        break;
      default:
        if (arg.startsWith("--")) {
          throw new ValidationError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (positionals.length > 1 || (positionals.length === 1 && command !== "analyze" && !DATE_COMMANDS.includes(command))) {
    throw new ValidationError(`Unexpected argument(s) for ${command}: ${positionals.join(" ")}`);
  }
  const [argument] = positionals;
  if (argument !== undefined) {
    if (command === "analyze") {
      parsed.limit = parseLimit(argument);
    } else {
      parsed.date = parseIsoDate(argument);
    }
  }
  return parsed;
}

function applyOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    enabledSources: parsed.sourceIds ?? config.enabledSources,
  };
}

function exitCodeFor(summary: RunSummary): number {
  return summary.outcome === "success" ? 0 : 1;
}

async function dispatch(parsed: ParsedCliArgs, context: CommandContext): Promise<number> {
  const { logger } = context;
  switch (parsed.command) {
    case "scrape":
      return exitCodeFor(await runPipeline({ ...context, logger: logger.child("scrape") }, "scrape_only", { date: parsed.date }));
    case "analyze":
      return exitCodeFor(
        await runPipeline({ ...context, logger: logger.child("analyze") }, "analyze_only", {
          limit: parsed.limit,
          force: parsed.force,
        }),
      );
    case "both":
      return exitCodeFor(
        await runPipeline({ ...context, logger: logger.child("both") }, "both", { date: parsed.date, force: parsed.force }),
      );
    case "report":
      await runReport({ ...context, logger: logger.child("report") }, parsed.date);
      return 0;
    case "daily-report":
      await runDailyReport({ ...context, logger: logger.child("report") }, parsed.date);
      return 0;
    case "backfill-urls": {
      const stats = await runBackfill({ ...context, logger: logger.child("backfill") });
      return stats.listingsFailed === 0 && !stats.cancelled ? 0 : 1;
    }
    case "auto":
      return exitCodeFor(await runAuto({ ...context, logger: logger.child("auto") }));
    case "status":
      await runStatus({ ...context, logger: logger.child("status") });
      return 0;
  }
}

export async function runCli(argv: string[]): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(HELP_TEXT.trim());
    return 1;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId });
  const ledger = createLedger(config);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("shutdown_requested", { signal });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("command_start", {
    command: parsed.command,
    date: parsed.date,
    limit: parsed.limit,
    force: parsed.force,
    sources: config.enabledSources.length,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    const exitCode = await dispatch(parsed, {
      runId,
      config,
      ledger,
      logger,
      metrics,
      sink,
      signal: controller.signal,
    });
    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return 1;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    await ledger.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
