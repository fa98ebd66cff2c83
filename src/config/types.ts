export interface OutputDirs {
  opinions: string;
  reports: string;
  manifests: string;
}

export type SinkType = "local_jsonl";

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  documentDelayMs: number;
  sourceDelayMs: number;
  sourceConcurrency: number;
  enabledSources: string[];
  analysisBatchSize?: number;
  analysisEnabled: boolean;
  analysisApiKey?: string;
  analysisApiBaseUrl: string;
  analysisModel: string;
  analysisMaxTokens: number;
  analysisStreaming: boolean;
  analysisPromptPath: string;
  analysisMaxContentChars: number;
  analysisTimeoutMs: number;
  analysisDelayMs: number;
  outputDirs: OutputDirs;
  ledgerPath: string;
  sinkType: SinkType;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
