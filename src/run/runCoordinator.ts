import type { AnalysisDriver } from "../analysis";
import type { AppConfig } from "../config";
import { parseIsoDate, previousBusinessDay } from "../core/dates";
import { ConfigError, errorMessage, PersistenceError } from "../core/errors";
import type { IngestionCoordinator } from "../ingest";
import type { Ledger } from "../ledger";
import type { Logger } from "../observability";
import { publishSafely, type Sink } from "../sink";
import type { AnalysisStats, IngestionStats, RunMode, RunOutcome, RunSummary } from "../types";

export interface RunParams {
  /** Publication date to ingest; defaults to the previous business day. */
  date?: string;
  sourceIds?: readonly string[];
  limit?: number;
  force?: boolean;
  /** Retry previously failed downloads before ingesting the date. */
  retryPending?: boolean;
  runId?: string;
  signal?: AbortSignal;
}

export interface RunCoordinatorDependencies {
  config: Pick<AppConfig, "enabledSources" | "analysisEnabled" | "analysisBatchSize">;
  ledger: Ledger;
  ingestion: Pick<IngestionCoordinator, "ingest" | "retryPending">;
  /** Absent when no analysis engine could be configured. */
  analysis?: Pick<AnalysisDriver, "analyzeBatch">;
  logger: Logger;
  sink?: Sink;
  now?: () => Date;
}

export interface OutcomeInput {
  stageFailed: boolean;
  failedUnits: number;
  successfulUnits: number;
  cancelled: boolean;
}

export type FinalOutcome = Exclude<RunOutcome, "running">;

export function computeOutcome(input: OutcomeInput): FinalOutcome {
  if (input.stageFailed) {
    return "failure";
  }
  if (input.failedUnits === 0) {
    return input.cancelled ? "partial_failure" : "success";
  }
  if (input.successfulUnits === 0) {
    return "failure";
  }
  return "partial_failure";
}

interface StageResults {
  retry?: IngestionStats;
  ingest?: IngestionStats;
  analysis?: AnalysisStats;
}

function listedSources(stats: IngestionStats | undefined): number {
  if (!stats) {
    return 0;
  }
  return Object.values(stats.perSource).filter((source) => source.status === "ok" || source.status === "all_failed").length;
}

/**
 * Runs one pipeline invocation end to end: records the run, dispatches ingestion and analysis by
 * mode, and always closes the run record with counts and an outcome.
 */
export class RunCoordinator {
  private readonly deps: RunCoordinatorDependencies;

  constructor(deps: RunCoordinatorDependencies) {
    this.deps = deps;
  }

  async run(mode: RunMode, params: RunParams = {}): Promise<RunSummary> {
    const { ledger, logger } = this.deps;
    const now = this.deps.now ?? (() => new Date());
    const targetDate =
      mode === "analyze_only" ? undefined : parseIsoDate(params.date ?? previousBusinessDay(now()));

    const started = await ledger.startRun(mode, targetDate, params.runId);
    const runLogger = logger.withRunId(started.runId);
    runLogger.info("run_start", { mode, targetDate });

    const results: StageResults = {};
    let stageError: unknown;
    try {
      await this.dispatch(mode, targetDate, params, results, runLogger);
    } catch (error) {
      stageError = error;
      runLogger.error("run_stage_failed", { mode, error: errorMessage(error) });
    }

    const summary = this.summarize(started, results, stageError, now());
    await ledger.finalizeRun(summary);
    runLogger.info("run_complete", { ...summary });

    if (this.deps.sink) {
      const sink = this.deps.sink;
      await publishSafely(runLogger, "run", () => sink.publishRunSummary(summary));
    }

    if (stageError instanceof PersistenceError) {
      throw stageError;
    }
    return summary;
  }

  private async dispatch(
    mode: RunMode,
    targetDate: string | undefined,
    params: RunParams,
    results: StageResults,
    logger: Logger,
  ): Promise<void> {
    const { config, ingestion } = this.deps;
    const sourceIds = params.sourceIds ?? config.enabledSources;

    if (mode !== "analyze_only" && targetDate) {
      if (params.retryPending) {
        results.retry = await ingestion.retryPending(sourceIds, params.signal, { excludeDate: targetDate });
      }
      if (!params.signal?.aborted) {
        results.ingest = await ingestion.ingest(sourceIds, targetDate, params.signal);
      }
    }

    if (mode === "scrape_only" || params.signal?.aborted) {
      return;
    }

    if (!config.analysisEnabled) {
      logger.info("analysis_disabled");
      return;
    }
    const analysis = this.deps.analysis;
    if (!analysis) {
      throw new ConfigError("analysis is enabled but no analysis engine is configured (set ANTHROPIC_API_KEY)");
    }
    results.analysis = await analysis.analyzeBatch(
      { limit: params.limit ?? config.analysisBatchSize, force: params.force },
      params.signal,
    );
  }

  private summarize(started: RunSummary, results: StageResults, stageError: unknown, finishedAt: Date): RunSummary {
    const { retry, ingest, analysis } = results;
    const summary: RunSummary = {
      ...started,
      finishedAt: finishedAt.toISOString(),
      sourcesChecked: ingest?.sourcesChecked ?? 0,
      sourcesFailed: ingest?.sourcesFailed ?? 0,
      opinionsDiscovered: ingest?.discovered ?? 0,
      opinionsDownloaded: (ingest?.downloaded ?? 0) + (retry?.downloaded ?? 0),
      opinionsFailed: (ingest?.failed ?? 0) + (retry?.failed ?? 0),
      analysesCompleted: analysis?.succeeded ?? 0,
      analysesFailed: analysis?.failed ?? 0,
      outcome: "running",
      errorMessage: stageError === undefined ? undefined : errorMessage(stageError),
    };

    summary.outcome = computeOutcome({
      stageFailed: stageError !== undefined,
      failedUnits: summary.opinionsFailed + summary.analysesFailed + summary.sourcesFailed,
      successfulUnits: summary.opinionsDownloaded + summary.analysesCompleted + listedSources(ingest),
      cancelled: Boolean(retry?.cancelled || ingest?.cancelled || analysis?.cancelled),
    });
    return summary;
  }
}
