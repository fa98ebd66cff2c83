import type { DownloadOutcome, RunSummary } from "../types";

export type SinkStage = "discovered" | "download" | "analysis" | "run";

export interface DiscoveredEvent {
  opinionId: number;
  sourceId: string;
  caseNumber: string;
  opinionType: string;
  publicationDate: string;
  listingUrl: string;
  directArtifactUrl?: string;
  discoveredAt: string;
}

export interface AnalysisEvent {
  opinionId: number;
  sourceId: string;
  caseNumber: string;
  opinionType: string;
  engineModel: string;
  interestingIssueCount: number;
  interesting: boolean;
  analyzedAt: string;
}

export interface Sink {
  publishDiscovered(items: DiscoveredEvent[]): Promise<void>;
  publishDownloadResult(results: DownloadOutcome[]): Promise<void>;
  publishAnalysisResult(results: AnalysisEvent[]): Promise<void>;
  publishRunSummary(summary: RunSummary): Promise<void>;
}
