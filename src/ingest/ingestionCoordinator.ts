import path from "node:path";
import type { AppConfig } from "../config";
import { processWithConcurrency, sleep as defaultSleep, type SleepFn } from "../core/concurrency";
import { parseIsoDate, toCompactDate } from "../core/dates";
import { DownloadExhaustedError, errorMessage, OperationCancelledError } from "../core/errors";
import type { DownloadManager, FetchedArtifact } from "../download";
import type { Ledger } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import { type DiscoveredEvent, publishSafely, type Sink } from "../sink";
import type { SourceAdapter } from "../sources";
import type { DownloadOutcome, IngestionStats, Opinion, OpinionRef, SourceIngestionStats } from "../types";

export interface IngestionDependencies {
  config: Pick<AppConfig, "outputDirs" | "documentDelayMs" | "sourceDelayMs" | "sourceConcurrency">;
  ledger: Ledger;
  adapter: SourceAdapter;
  downloads: Pick<DownloadManager, "fetch">;
  logger: Logger;
  metrics: MetricsRegistry;
  sink?: Sink;
  sleep?: SleepFn;
}

export interface RetryPendingOptions {
  /** Publication date ingested in the same run; its opinions are left to that pass. */
  excludeDate?: string;
}

type DownloadAttemptResult = "downloaded" | "failed" | "cancelled";

function safeFileToken(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]+/g, "_");
}

/** `<opinionsDir>/<YYYYMMDD>/<sourceId>_<caseNumber>_<opinionType>.pdf` */
export function artifactPath(
  opinionsDir: string,
  opinion: Pick<Opinion, "sourceId" | "caseNumber" | "opinionType" | "publicationDate">,
): string {
  const fileName = [opinion.sourceId, opinion.caseNumber, opinion.opinionType].map(safeFileToken).join("_");
  return path.join(opinionsDir, toCompactDate(opinion.publicationDate), `${fileName}.pdf`);
}

function emptySourceStats(): SourceIngestionStats {
  return { status: "ok", discovered: 0, newlyDiscovered: 0, downloaded: 0, skipped: 0, failed: 0 };
}

function identityKey(ref: Pick<OpinionRef, "sourceId" | "caseNumber" | "opinionType">): string {
  return `${ref.sourceId}|${ref.caseNumber}|${ref.opinionType}`;
}

function summarize(perSource: Record<string, SourceIngestionStats>, sourcesChecked: number, cancelled: boolean): IngestionStats {
  const stats: IngestionStats = {
    sourcesChecked,
    sourcesFailed: 0,
    discovered: 0,
    downloaded: 0,
    skipped: 0,
    failed: 0,
    cancelled,
    perSource,
  };
  for (const source of Object.values(perSource)) {
    if (source.status === "unavailable" || source.status === "all_failed") {
      stats.sourcesFailed += 1;
    }
    stats.discovered += source.discovered;
    stats.downloaded += source.downloaded;
    stats.skipped += source.skipped;
    stats.failed += source.failed;
  }
  return stats;
}

/**
 * Lists each requested source for one date, records every candidate in the ledger and downloads
 * the ones not yet stored. A failing source never stops the others; ledger failures do.
 */
export class IngestionCoordinator {
  private readonly deps: IngestionDependencies;
  private readonly sleep: SleepFn;

  constructor(deps: IngestionDependencies) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async ingest(sourceIds: readonly string[], date: string, signal?: AbortSignal): Promise<IngestionStats> {
    const targetDate = parseIsoDate(date);
    const sources = [...new Set(sourceIds.map((sourceId) => sourceId.trim().toLowerCase()))].filter((id) => id.length > 0);
    const concurrency = Math.max(1, this.deps.config.sourceConcurrency);
    const perSource: Record<string, SourceIngestionStats> = {};
    let sourcesChecked = 0;
    let cancelled = false;

    this.deps.logger.info("ingest_start", { date: targetDate, sources: sources.length, concurrency });

    await processWithConcurrency(sources, concurrency, async (sourceId, index) => {
      if (index >= concurrency) {
        await this.sleep(this.deps.config.sourceDelayMs, signal);
      }

      if (signal?.aborted) {
        perSource[sourceId] = { ...emptySourceStats(), status: "cancelled" };
        cancelled = true;
        return;
      }

      sourcesChecked += 1;
      const stats = await this.ingestSource(sourceId, targetDate, signal);
      perSource[sourceId] = stats;
      if (stats.status === "cancelled") {
        cancelled = true;
      }
    });

    // Keep the caller's source order regardless of completion order.
    const ordered: Record<string, SourceIngestionStats> = {};
    for (const sourceId of sources) {
      ordered[sourceId] = perSource[sourceId] ?? { ...emptySourceStats(), status: "cancelled" };
    }

    const stats = summarize(ordered, sourcesChecked, cancelled);
    this.deps.logger.info("ingest_complete", {
      date: targetDate,
      sourcesChecked: stats.sourcesChecked,
      sourcesFailed: stats.sourcesFailed,
      discovered: stats.discovered,
      downloaded: stats.downloaded,
      skipped: stats.skipped,
      failed: stats.failed,
      cancelled: stats.cancelled,
    });
    return stats;
  }

  /**
   * Downloads opinions the ledger knows about but never stored, e.g. after an interrupted run.
   * Records without a direct document link are left for `backfill-urls`.
   */
  async retryPending(
    sourceIds?: readonly string[],
    signal?: AbortSignal,
    options: RetryPendingOptions = {},
  ): Promise<IngestionStats> {
    const pending = (await this.deps.ledger.findUndownloaded(sourceIds)).filter(
      (opinion) => opinion.publicationDate !== options.excludeDate,
    );
    const perSource: Record<string, SourceIngestionStats> = {};
    const outcomes: DownloadOutcome[] = [];
    let cancelled = false;
    let fetched = 0;

    this.deps.logger.info("retry_pending_start", { pending: pending.length });

    for (const opinion of pending) {
      const stats = perSource[opinion.sourceId] ?? emptySourceStats();
      perSource[opinion.sourceId] = stats;

      if (!opinion.directArtifactUrl) {
        stats.skipped += 1;
        this.deps.logger.debug("retry_pending_no_url", { opinionId: opinion.id, sourceId: opinion.sourceId });
        continue;
      }

      if (fetched > 0) {
        await this.sleep(this.deps.config.documentDelayMs, signal);
      }
      if (signal?.aborted) {
        cancelled = true;
        stats.status = "cancelled";
        break;
      }

      fetched += 1;
      const result = await this.download(opinion, opinion.directArtifactUrl, outcomes, signal);
      if (result === "cancelled") {
        cancelled = true;
        stats.status = "cancelled";
        break;
      }
      if (result === "downloaded") {
        stats.downloaded += 1;
      } else {
        stats.failed += 1;
      }
    }

    await this.publishOutcomes([], outcomes);
    const stats = summarize(perSource, 0, cancelled);
    this.deps.logger.info("retry_pending_complete", {
      downloaded: stats.downloaded,
      failed: stats.failed,
      skipped: stats.skipped,
      cancelled,
    });
    return stats;
  }

  private async ingestSource(sourceId: string, date: string, signal?: AbortSignal): Promise<SourceIngestionStats> {
    const { adapter, ledger, logger, metrics } = this.deps;
    const stats = emptySourceStats();
    metrics.incrementCounter("sources_checked");
    logger.info("ingest_source_start", { sourceId, date });

    let refs: OpinionRef[];
    try {
      refs = await adapter.list(sourceId, date, signal);
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        return { ...stats, status: "cancelled" };
      }
      metrics.incrementCounter("sources_failed");
      logger.error("ingest_source_unavailable", { sourceId, date, error: errorMessage(error) });
      return { ...stats, status: "unavailable", error: errorMessage(error) };
    }

    const discoveredEvents: DiscoveredEvent[] = [];
    const outcomes: DownloadOutcome[] = [];
    const seen = new Set<string>();
    let fetched = 0;

    for (const ref of refs) {
      if (signal?.aborted) {
        stats.status = "cancelled";
        break;
      }

      const key = identityKey(ref);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const { id, wasNew, opinion } = await ledger.upsertOpinion({
        sourceId: ref.sourceId,
        caseNumber: ref.caseNumber,
        opinionType: ref.opinionType,
        publicationDate: ref.publicationDate,
        listingUrl: ref.listingUrl,
        directArtifactUrl: ref.documentUrl,
        caseUrl: ref.caseUrl,
        description: ref.description,
      });
      stats.discovered += 1;
      if (wasNew) {
        stats.newlyDiscovered += 1;
        metrics.incrementCounter("opinions_discovered");
        discoveredEvents.push({
          opinionId: id,
          sourceId: opinion.sourceId,
          caseNumber: opinion.caseNumber,
          opinionType: opinion.opinionType,
          publicationDate: opinion.publicationDate,
          listingUrl: opinion.listingUrl,
          directArtifactUrl: opinion.directArtifactUrl,
          discoveredAt: opinion.discoveredAt,
        });
      }

      if (opinion.downloadState === "downloaded") {
        stats.skipped += 1;
        logger.debug("ingest_opinion_already_downloaded", { sourceId, opinionId: id, caseNumber: opinion.caseNumber });
        continue;
      }

      if (fetched > 0) {
        await this.sleep(this.deps.config.documentDelayMs, signal);
        if (signal?.aborted) {
          stats.status = "cancelled";
          break;
        }
      }
      fetched += 1;

      const result = await this.download(opinion, ref.documentUrl, outcomes, signal);
      if (result === "cancelled") {
        stats.status = "cancelled";
        break;
      }
      if (result === "downloaded") {
        stats.downloaded += 1;
      } else {
        stats.failed += 1;
      }
    }

    if (stats.status !== "cancelled" && stats.failed > 0 && stats.downloaded === 0) {
      stats.status = "all_failed";
      metrics.incrementCounter("sources_failed");
    }

    await this.publishOutcomes(discoveredEvents, outcomes);
    logger.info("ingest_source_complete", { sourceId, date, ...stats });
    return stats;
  }

  private async download(
    opinion: Opinion,
    url: string,
    outcomes: DownloadOutcome[],
    signal?: AbortSignal,
  ): Promise<DownloadAttemptResult> {
    const { ledger, logger, metrics, downloads, config } = this.deps;
    const destination = artifactPath(config.outputDirs.opinions, opinion);
    const base = {
      opinionId: opinion.id,
      sourceId: opinion.sourceId,
      caseNumber: opinion.caseNumber,
      opinionType: opinion.opinionType,
      url,
    };

    let artifact: FetchedArtifact;
    try {
      artifact = await downloads.fetch(url, "pdf", destination, signal);
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        logger.info("download_cancelled", { opinionId: opinion.id, url });
        return "cancelled";
      }

      const attempts = error instanceof DownloadExhaustedError ? error.attempts : 1;
      const message = errorMessage(error);
      const finishedAt = new Date().toISOString();
      await ledger.updateDownloadState(opinion.id, "download_failed", { attempts, error: message, at: finishedAt });
      metrics.incrementCounter("downloads_failed");
      logger.error("download_failed", { ...base, attempts, error: message });
      outcomes.push({ ...base, state: "download_failed", attempts, error: message, finishedAt });
      return "failed";
    }

    const finishedAt = new Date().toISOString();
    await ledger.updateDownloadState(opinion.id, "downloaded", {
      localArtifactPath: artifact.path,
      contentHash: artifact.sha256,
      attempts: artifact.attempts,
      at: finishedAt,
    });
    metrics.incrementCounter("downloads_ok");
    logger.info("download_ok", { ...base, path: artifact.path, bytes: artifact.size, attempts: artifact.attempts });
    outcomes.push({
      ...base,
      state: "downloaded",
      localArtifactPath: artifact.path,
      contentHash: artifact.sha256,
      bytes: artifact.size,
      attempts: artifact.attempts,
      finishedAt,
    });
    return "downloaded";
  }

  private async publishOutcomes(discovered: DiscoveredEvent[], outcomes: DownloadOutcome[]): Promise<void> {
    const { sink, logger } = this.deps;
    if (!sink) {
      return;
    }
    await publishSafely(logger, "discovered", () => sink.publishDiscovered(discovered));
    await publishSafely(logger, "download", () => sink.publishDownloadResult(outcomes));
  }
}
