import { AnalysisDriver, createAnalysisEngine } from "../analysis";
import type { AppConfig } from "../config";
import { DownloadManager } from "../download";
import { backfillDirectUrls, IngestionCoordinator, type BackfillStats } from "../ingest";
import type { Ledger } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import { writeReport, type ReportResult } from "../report";
import { RunCoordinator } from "../run";
import type { Sink } from "../sink";
import { TexasCoaSourceAdapter } from "../sources";
import type { RunMode, RunSummary } from "../types";
import { previousBusinessDay } from "./dates";
import { createHttpFetch, type FetchLike } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  ledger: Ledger;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  signal?: AbortSignal;
  /** Replaces the undici-backed fetch; used by tests. */
  fetchFn?: FetchLike;
  now?: () => Date;
}

export interface RunCommandOptions {
  date?: string;
  limit?: number;
  force?: boolean;
  retryPending?: boolean;
}

function sourceAdapter(ctx: CommandContext, fetchFn: FetchLike): TexasCoaSourceAdapter {
  return new TexasCoaSourceAdapter({
    config: ctx.config,
    fetchFn,
    logger: ctx.logger.child("source_adapter"),
    metrics: ctx.metrics,
  });
}

function buildRunCoordinator(ctx: CommandContext): RunCoordinator {
  const fetchFn = ctx.fetchFn ?? createHttpFetch(ctx.config.ignoreHttpsErrors);
  const adapter = sourceAdapter(ctx, fetchFn);
  const ingestion = new IngestionCoordinator({
    config: ctx.config,
    ledger: ctx.ledger,
    adapter,
    downloads: new DownloadManager({
      config: ctx.config,
      fetchFn,
      logger: ctx.logger.child("download"),
      metrics: ctx.metrics,
    }),
    logger: ctx.logger.child("ingest"),
    metrics: ctx.metrics,
    sink: ctx.sink,
  });

  const engine = ctx.config.analysisEnabled
    ? createAnalysisEngine(ctx.config, ctx.logger)
    : undefined;
  const analysis = engine
    ? new AnalysisDriver({
        config: ctx.config,
        ledger: ctx.ledger,
        engine,
        parties: adapter,
        logger: ctx.logger.child("analysis"),
        metrics: ctx.metrics,
        sink: ctx.sink,
      })
    : undefined;

  return new RunCoordinator({
    config: ctx.config,
    ledger: ctx.ledger,
    ingestion,
    analysis,
    logger: ctx.logger.child("run"),
    sink: ctx.sink,
    now: ctx.now,
  });
}

export async function runPipeline(ctx: CommandContext, mode: RunMode, options: RunCommandOptions = {}): Promise<RunSummary> {
  return buildRunCoordinator(ctx).run(mode, {
    ...options,
    runId: ctx.runId,
    signal: ctx.signal,
  });
}

export async function runReport(ctx: CommandContext, date?: string): Promise<ReportResult | undefined> {
  return writeReport(
    { config: ctx.config, ledger: ctx.ledger, logger: ctx.logger },
    { date, now: ctx.now?.() },
  );
}

export async function runDailyReport(ctx: CommandContext, date?: string): Promise<ReportResult | undefined> {
  return runReport(ctx, date ?? previousBusinessDay(ctx.now?.()));
}

export async function runBackfill(ctx: CommandContext): Promise<BackfillStats> {
  const fetchFn = ctx.fetchFn ?? createHttpFetch(ctx.config.ignoreHttpsErrors);
  return backfillDirectUrls(
    {
      config: ctx.config,
      ledger: ctx.ledger,
      adapter: sourceAdapter(ctx, fetchFn),
      logger: ctx.logger,
    },
    ctx.signal,
  );
}

/** Unattended daily job: retry pending downloads, ingest and analyze the previous business day, then report it. */
export async function runAuto(ctx: CommandContext): Promise<RunSummary> {
  const date = previousBusinessDay(ctx.now?.());
  ctx.logger.info("auto_start", { date });
  const summary = await runPipeline(ctx, "both", { date, retryPending: true });
  if (!ctx.signal?.aborted) {
    await runDailyReport(ctx, date);
  }
  return summary;
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  const stats = await ctx.ledger.getStats();
  const recentRuns = await ctx.ledger.listRecentRuns(5);
  ctx.logger.info("status", {
    ...stats,
    recentRuns: recentRuns.map((run) => ({
      runId: run.runId,
      mode: run.mode,
      targetDate: run.targetDate,
      startedAt: run.startedAt,
      outcome: run.outcome,
      downloaded: run.opinionsDownloaded,
      failed: run.opinionsFailed,
      analyzed: run.analysesCompleted,
    })),
  });
}
