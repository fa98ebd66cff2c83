import fs from "node:fs";
import type { AppConfig } from "../config";
import { sleep as defaultSleep, type SleepFn } from "../core/concurrency";
import { AnalysisEngineError, errorMessage, OperationCancelledError, PersistenceError } from "../core/errors";
import type { Ledger } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import { type AnalysisEvent, publishSafely, type Sink } from "../sink";
import type { CasePartiesSource } from "../sources";
import type { Analysis, AnalysisStats, CaseParty, Opinion } from "../types";
import { parseFindings } from "./findings";
import type { AnalysisEngine, AnalyzeBatchOptions, EngineResponse } from "./types";

export interface AnalysisDriverDependencies {
  config: Pick<AppConfig, "analysisDelayMs" | "documentDelayMs">;
  ledger: Ledger;
  engine: AnalysisEngine;
  /** Looked up after an interesting analysis to record the case's attorneys of record. */
  parties?: CasePartiesSource;
  logger: Logger;
  metrics: MetricsRegistry;
  sink?: Sink;
  sleep?: SleepFn;
  readArtifact?: (filePath: string) => Promise<Buffer>;
}

/** Concatenates a streamed response in order; a stream without its `done` chunk is incomplete. */
export async function collectResponseText(response: EngineResponse): Promise<{ text: string; model: string }> {
  if (response.kind === "complete") {
    return { text: response.text, model: response.model };
  }

  const parts: string[] = [];
  for await (const chunk of response.chunks) {
    if (chunk.type === "done") {
      return { text: parts.join(""), model: chunk.model ?? response.model };
    }
    parts.push(chunk.text);
  }
  throw new AnalysisEngineError("stream_error", "analysis stream ended without a terminal chunk");
}

/**
 * Sends downloaded opinions to the analysis engine one at a time, oldest first, and records each
 * result. Per-opinion failures are counted and logged; ledger failures propagate.
 */
export class AnalysisDriver {
  private readonly deps: AnalysisDriverDependencies;
  private readonly sleep: SleepFn;
  private readonly readArtifact: (filePath: string) => Promise<Buffer>;

  constructor(deps: AnalysisDriverDependencies) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
    this.readArtifact = deps.readArtifact ?? ((filePath) => fs.promises.readFile(filePath));
  }

  async analyzeBatch(options: AnalyzeBatchOptions = {}, signal?: AbortSignal): Promise<AnalysisStats> {
    const { ledger, logger } = this.deps;
    const force = options.force ?? false;
    const candidates = force ? await ledger.findAnalyzed(options.limit) : await ledger.findUnanalyzed(options.limit);
    const stats: AnalysisStats = { attempted: 0, succeeded: 0, failed: 0, cancelled: false };
    const events: AnalysisEvent[] = [];

    logger.info("analysis_batch_start", { candidates: candidates.length, limit: options.limit, force });

    for (const opinion of candidates) {
      if (stats.attempted > 0) {
        await this.sleep(this.deps.config.analysisDelayMs, signal);
      }
      if (signal?.aborted) {
        stats.cancelled = true;
        break;
      }

      stats.attempted += 1;
      try {
        const analysis = await this.analyzeOne(opinion, force, signal);
        stats.succeeded += 1;
        if (analysis) {
          events.push({
            opinionId: opinion.id,
            sourceId: opinion.sourceId,
            caseNumber: opinion.caseNumber,
            opinionType: opinion.opinionType,
            engineModel: analysis.engineModel,
            interestingIssueCount: analysis.interestingIssueCount,
            interesting: analysis.interesting,
            analyzedAt: analysis.analyzedAt,
          });
        }
      } catch (error) {
        if (error instanceof PersistenceError) {
          throw error;
        }
        if (error instanceof OperationCancelledError) {
          stats.cancelled = true;
          break;
        }
        stats.failed += 1;
        this.deps.metrics.incrementCounter("analyses_failed");
        logger.error("analysis_failed", {
          opinionId: opinion.id,
          sourceId: opinion.sourceId,
          caseNumber: opinion.caseNumber,
          code: error instanceof AnalysisEngineError ? error.code : undefined,
          error: errorMessage(error),
        });
      }
    }

    if (this.deps.sink) {
      const sink = this.deps.sink;
      await publishSafely(logger, "analysis", () => sink.publishAnalysisResult(events));
    }

    logger.info("analysis_batch_complete", { ...stats });
    return stats;
  }

  /** Returns the stored analysis, or undefined when another writer recorded one first. */
  private async analyzeOne(opinion: Opinion, replace: boolean, signal?: AbortSignal): Promise<Analysis | undefined> {
    const { engine, ledger, logger, metrics } = this.deps;
    if (!opinion.localArtifactPath) {
      throw new Error(`opinion ${opinion.id} has no stored artifact`);
    }

    const bytes = await this.readArtifact(opinion.localArtifactPath);
    logger.info("analysis_start", { opinionId: opinion.id, caseNumber: opinion.caseNumber, bytes: bytes.length });

    const stopTimer = metrics.startTimer("analysis_ms");
    const response = await engine.analyze(bytes, {
      opinionId: opinion.id,
      sourceId: opinion.sourceId,
      caseNumber: opinion.caseNumber,
      opinionType: opinion.opinionType,
      publicationDate: opinion.publicationDate,
      signal,
    });
    const { text, model } = await collectResponseText(response);
    const durationMs = stopTimer();

    if (text.trim().length === 0) {
      throw new AnalysisEngineError("no_text", `analysis engine returned no text for ${opinion.caseNumber}`);
    }

    const findings = parseFindings(text);
    const analysis: Analysis = {
      opinionId: opinion.id,
      engineModel: model,
      rawResultText: text,
      interestingIssueCount: findings.interestingIssueCount,
      interesting: findings.interesting,
      analyzedAt: new Date().toISOString(),
    };

    const written = await ledger.recordAnalysis(analysis, { replace });
    metrics.incrementCounter("analyses_ok");
    if (!written) {
      logger.warn("analysis_already_recorded", { opinionId: opinion.id, caseNumber: opinion.caseNumber });
      return undefined;
    }

    logger.info("analysis_ok", {
      opinionId: opinion.id,
      caseNumber: opinion.caseNumber,
      interesting: analysis.interesting,
      issues: analysis.interestingIssueCount,
      durationMs,
    });

    if (analysis.interesting) {
      await this.recordParties(opinion, signal);
    }
    return analysis;
  }

  /** Best effort: a case page that cannot be read is logged and the analysis stands. */
  private async recordParties(opinion: Opinion, signal?: AbortSignal): Promise<void> {
    const { parties, ledger, logger } = this.deps;
    if (!parties) {
      return;
    }
    const caseRef = { sourceId: opinion.sourceId, caseNumber: opinion.caseNumber };
    if ((await ledger.listRepresentatives(caseRef)).length > 0) {
      logger.debug("case_parties_known", { opinionId: opinion.id, caseNumber: opinion.caseNumber });
      return;
    }

    await this.sleep(this.deps.config.documentDelayMs, signal);
    if (signal?.aborted) {
      return;
    }

    let found: CaseParty[];
    try {
      found = await parties.fetchParties(opinion, signal);
    } catch (error) {
      logger.warn("case_parties_failed", {
        opinionId: opinion.id,
        sourceId: opinion.sourceId,
        caseNumber: opinion.caseNumber,
        error: errorMessage(error),
      });
      return;
    }

    if (found.length === 0) {
      logger.info("case_parties_none", { opinionId: opinion.id, caseNumber: opinion.caseNumber });
      return;
    }
    const saved = await ledger.recordRepresentatives(caseRef, found);
    logger.info("case_parties_recorded", { opinionId: opinion.id, caseNumber: opinion.caseNumber, parties: saved });
  }
}
