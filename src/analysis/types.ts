export interface AnalysisContext {
  opinionId: number;
  sourceId: string;
  caseNumber: string;
  opinionType: string;
  publicationDate: string;
  signal?: AbortSignal;
}

export type AnalysisChunk = { type: "delta"; text: string } | { type: "done"; model?: string; stopReason?: string };

export interface AnalysisResult {
  kind: "complete";
  model: string;
  text: string;
}

/** Ordered text fragments ending in exactly one `done` chunk. */
export interface StreamedAnalysisResult {
  kind: "stream";
  model: string;
  chunks: AsyncIterable<AnalysisChunk>;
}

export type EngineResponse = AnalysisResult | StreamedAnalysisResult;

export interface AnalysisEngine {
  readonly model: string;
  analyze(bytes: Buffer, context: AnalysisContext): Promise<EngineResponse>;
}

export interface Findings {
  interestingIssueCount: number;
  interesting: boolean;
}

export interface AnalyzeBatchOptions {
  limit?: number;
  force?: boolean;
}
