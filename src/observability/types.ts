export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  sourceId?: string;
  opinionId?: number;
  caseNumber?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "sources_checked"
  | "sources_failed"
  | "opinions_discovered"
  | "downloads_ok"
  | "downloads_failed"
  | "analyses_ok"
  | "analyses_failed";

export type MetricTimerName = "listing_fetch_ms" | "download_ms" | "analysis_ms";
