export type DownloadState = "discovered" | "downloaded" | "download_failed";

export type RunMode = "scrape_only" | "analyze_only" | "both";

export type RunOutcome = "running" | "success" | "partial_failure" | "failure";

export interface OpinionIdentity {
  sourceId: string;
  caseNumber: string;
  opinionType: string;
}

/**
 * A single opinion document as listed by a source. Produced by a source adapter,
 * consumed by the ingestion coordinator.
 */
export interface OpinionRef extends OpinionIdentity {
  publicationDate: string;
  listingUrl: string;
  documentUrl: string;
  caseUrl?: string;
  description?: string;
}

export interface Opinion extends OpinionIdentity {
  id: number;
  publicationDate: string;
  listingUrl: string;
  directArtifactUrl?: string;
  caseUrl?: string;
  description?: string;
  localArtifactPath?: string;
  contentHash?: string;
  downloadState: DownloadState;
  downloadAttempts: number;
  lastError?: string;
  discoveredAt: string;
  downloadedAt?: string;
}

export interface Analysis {
  opinionId: number;
  engineModel: string;
  rawResultText: string;
  interestingIssueCount: number;
  interesting: boolean;
  analyzedAt: string;
}

export type CaseIdentity = Pick<OpinionIdentity, "sourceId" | "caseNumber">;

/** A non-State party to a case with its attorneys of record, as listed on the case page. */
export interface CaseParty {
  partyName: string;
  partyType: string;
  representatives: string[];
}

export interface RunSummary {
  runId: string;
  mode: RunMode;
  targetDate?: string;
  startedAt: string;
  finishedAt?: string;
  sourcesChecked: number;
  sourcesFailed: number;
  opinionsDiscovered: number;
  opinionsDownloaded: number;
  opinionsFailed: number;
  analysesCompleted: number;
  analysesFailed: number;
  outcome: RunOutcome;
  errorMessage?: string;
}

export interface DownloadOutcome {
  opinionId: number;
  sourceId: string;
  caseNumber: string;
  opinionType: string;
  url: string;
  state: Exclude<DownloadState, "discovered">;
  localArtifactPath?: string;
  contentHash?: string;
  bytes?: number;
  attempts: number;
  error?: string;
  finishedAt: string;
}

export type SourceStatus = "ok" | "unavailable" | "all_failed" | "cancelled";

export interface SourceIngestionStats {
  status: SourceStatus;
  discovered: number;
  newlyDiscovered: number;
  downloaded: number;
  skipped: number;
  failed: number;
  error?: string;
}

export interface IngestionStats {
  sourcesChecked: number;
  sourcesFailed: number;
  discovered: number;
  downloaded: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
  perSource: Record<string, SourceIngestionStats>;
}

export interface AnalysisStats {
  attempted: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}
