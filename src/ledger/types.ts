import type { Analysis, CaseIdentity, CaseParty, DownloadState, Opinion, OpinionIdentity, RunMode, RunSummary } from "../types";

export interface NewOpinion extends OpinionIdentity {
  publicationDate: string;
  listingUrl: string;
  directArtifactUrl?: string;
  caseUrl?: string;
  description?: string;
  discoveredAt?: string;
}

export interface UpsertResult {
  id: number;
  wasNew: boolean;
  opinion: Opinion;
}

export interface DownloadStateDetails {
  localArtifactPath?: string;
  contentHash?: string;
  attempts?: number;
  error?: string;
  at?: string;
}

export interface RecordAnalysisOptions {
  /** Operator-forced re-run: overwrite the existing analysis instead of keeping it. */
  replace?: boolean;
}

export interface AnalysisReportRow {
  opinion: Opinion;
  analysis: Analysis;
}

export interface AnalysisQuery {
  publicationDate?: string;
  interestingOnly: boolean;
}

export interface LedgerStats {
  totalOpinions: number;
  discovered: number;
  downloaded: number;
  downloadFailed: number;
  analyzed: number;
  interesting: number;
  pendingAnalysis: number;
}

/**
 * Durable record store for opinions, analyses and run summaries. Every write that touches
 * more than one field of a record is atomic; storage failures surface as `PersistenceError`.
 */
export interface Ledger {
  upsertOpinion(input: NewOpinion): Promise<UpsertResult>;
  updateDownloadState(id: number, state: DownloadState, details?: DownloadStateDetails): Promise<void>;
  getOpinion(id: number): Promise<Opinion | undefined>;
  findOpinion(identity: OpinionIdentity): Promise<Opinion | undefined>;
  findUndownloaded(sourceFilter?: readonly string[]): Promise<Opinion[]>;
  findUnanalyzed(limit?: number): Promise<Opinion[]>;
  findAnalyzed(limit?: number): Promise<Opinion[]>;
  findMissingDirectUrls(): Promise<Opinion[]>;
  backfillDirectUrl(id: number, url: string): Promise<boolean>;
  recordAnalysis(analysis: Analysis, options?: RecordAnalysisOptions): Promise<boolean>;
  getAnalysis(opinionId: number): Promise<Analysis | undefined>;
  listAnalyses(query: AnalysisQuery): Promise<AnalysisReportRow[]>;
  /** Upserts by party name within the case and returns how many rows were written. */
  recordRepresentatives(caseRef: CaseIdentity, parties: CaseParty[], fetchedAt?: string): Promise<number>;
  listRepresentatives(caseRef: CaseIdentity): Promise<CaseParty[]>;
  startRun(mode: RunMode, targetDate?: string, runId?: string): Promise<RunSummary>;
  finalizeRun(summary: RunSummary): Promise<void>;
  getRun(runId: string): Promise<RunSummary | undefined>;
  listRecentRuns(limit: number): Promise<RunSummary[]>;
  getStats(): Promise<LedgerStats>;
  close(): Promise<void>;
}
