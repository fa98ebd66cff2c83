import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "../core/errors";
import { ALL_SOURCE_IDS } from "../sources/courts";
import type { AppConfig, ConfigOverrides, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://search.txcourts.gov/",
  userAgent: "opinion-ledger/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  maxRetries: 3,
  retryBaseDelayMs: 1_000,
  documentDelayMs: 1_000,
  sourceDelayMs: 2_000,
  sourceConcurrency: 1,
  enabledSources: [...ALL_SOURCE_IDS],
  analysisBatchSize: undefined,
  analysisEnabled: true,
  analysisApiKey: undefined,
  analysisApiBaseUrl: "https://api.anthropic.com",
  analysisModel: "claude-sonnet-4-20250514",
  analysisMaxTokens: 8_000,
  analysisStreaming: true,
  analysisPromptPath: "prompts/analysis-prompt.txt",
  analysisMaxContentChars: 150_000,
  analysisTimeoutMs: 300_000,
  analysisDelayMs: 1_000,
  outputDirs: {
    opinions: "data/opinions",
    reports: "data/reports",
    manifests: "data/manifests",
  },
  ledgerPath: "data/ledger.sqlite",
  sinkType: "local_jsonl",
};

const SINK_TYPES: readonly SinkType[] = ["local_jsonl"];

const configFileSchema = z
  .object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().positive(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    documentDelayMs: z.number().int().nonnegative(),
    sourceDelayMs: z.number().int().nonnegative(),
    sourceConcurrency: z.number().int().positive(),
    enabledSources: z.array(z.string()),
    analysisBatchSize: z.number().int().positive(),
    analysisEnabled: z.boolean(),
    analysisApiKey: z.string(),
    analysisApiBaseUrl: z.string().url(),
    analysisModel: z.string().min(1),
    analysisMaxTokens: z.number().int().positive(),
    analysisStreaming: z.boolean(),
    analysisPromptPath: z.string(),
    analysisMaxContentChars: z.number().int().positive(),
    analysisTimeoutMs: z.number().int().positive(),
    analysisDelayMs: z.number().int().nonnegative(),
    outputDirs: z
      .object({
        opinions: z.string(),
        reports: z.string(),
        manifests: z.string(),
      })
      .partial(),
    ledgerPath: z.string(),
    sinkType: z.enum(["local_jsonl"]),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Config file ${absolutePath} is invalid: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

function toOptionalInt(name: string, value: string | undefined, fallback: number | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return toInt(name, value, 0);
}

function toBool(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean, got '${value}'`);
}

export function toList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  const match = SINK_TYPES.find((sinkType) => sinkType === normalized);
  if (!match) {
    throw new ConfigError(`SINK_TYPE must be one of ${SINK_TYPES.join(", ")}, got '${value}'`);
  }
  return match;
}

function validate(config: AppConfig): AppConfig {
  const positive: Array<[string, number]> = [
    ["maxRetries", config.maxRetries],
    ["requestTimeoutMs", config.requestTimeoutMs],
    ["sourceConcurrency", config.sourceConcurrency],
    ["analysisMaxTokens", config.analysisMaxTokens],
    ["analysisMaxContentChars", config.analysisMaxContentChars],
    ["analysisTimeoutMs", config.analysisTimeoutMs],
  ];
  for (const [name, value] of positive) {
    if (value < 1) {
      throw new ConfigError(`${name} must be at least 1, got ${value}`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ["retryBaseDelayMs", config.retryBaseDelayMs],
    ["documentDelayMs", config.documentDelayMs],
    ["sourceDelayMs", config.sourceDelayMs],
    ["analysisDelayMs", config.analysisDelayMs],
  ];
  for (const [name, value] of nonNegative) {
    if (value < 0) {
      throw new ConfigError(`${name} must not be negative, got ${value}`);
    }
  }

  if (config.analysisBatchSize !== undefined && config.analysisBatchSize < 1) {
    throw new ConfigError(`analysisBatchSize must be at least 1, got ${config.analysisBatchSize}`);
  }

  const unknownSources = config.enabledSources.filter((sourceId) => !ALL_SOURCE_IDS.includes(sourceId));
  if (unknownSources.length > 0) {
    throw new ConfigError(`Unknown source id(s): ${unknownSources.join(", ")}`);
  }

  return config;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return validate({
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool("IGNORE_HTTPS_ERRORS", env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxRetries: toInt("MAX_RETRIES", env.MAX_RETRIES, merged.maxRetries),
    retryBaseDelayMs: toInt("RETRY_BASE_DELAY_MS", env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    documentDelayMs: toInt("DOCUMENT_DELAY_MS", env.DOCUMENT_DELAY_MS, merged.documentDelayMs),
    sourceDelayMs: toInt("SOURCE_DELAY_MS", env.SOURCE_DELAY_MS, merged.sourceDelayMs),
    sourceConcurrency: toInt("SOURCE_CONCURRENCY", env.SOURCE_CONCURRENCY, merged.sourceConcurrency),
    enabledSources: toList(env.ENABLED_SOURCES, merged.enabledSources),
    analysisBatchSize: toOptionalInt("ANALYSIS_BATCH_SIZE", env.ANALYSIS_BATCH_SIZE, merged.analysisBatchSize),
    analysisEnabled: toBool("ANALYSIS_ENABLED", env.ANALYSIS_ENABLED, merged.analysisEnabled),
    analysisApiKey: env.ANTHROPIC_API_KEY ?? merged.analysisApiKey,
    analysisApiBaseUrl: env.ANALYSIS_API_BASE_URL ?? merged.analysisApiBaseUrl,
    analysisModel: env.ANALYSIS_MODEL ?? merged.analysisModel,
    analysisMaxTokens: toInt("ANALYSIS_MAX_TOKENS", env.ANALYSIS_MAX_TOKENS, merged.analysisMaxTokens),
    analysisStreaming: toBool("ANALYSIS_STREAMING", env.ANALYSIS_STREAMING, merged.analysisStreaming),
    analysisPromptPath: env.ANALYSIS_PROMPT_PATH ?? merged.analysisPromptPath,
    analysisMaxContentChars: toInt("ANALYSIS_MAX_CONTENT_CHARS", env.ANALYSIS_MAX_CONTENT_CHARS, merged.analysisMaxContentChars),
    analysisTimeoutMs: toInt("ANALYSIS_TIMEOUT_MS", env.ANALYSIS_TIMEOUT_MS, merged.analysisTimeoutMs),
    analysisDelayMs: toInt("ANALYSIS_DELAY_MS", env.ANALYSIS_DELAY_MS, merged.analysisDelayMs),
    ledgerPath: env.LEDGER_PATH ?? merged.ledgerPath,
    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    outputDirs: {
      opinions: env.OUTPUT_OPINIONS_DIR ?? merged.outputDirs.opinions,
      reports: env.OUTPUT_REPORTS_DIR ?? merged.outputDirs.reports,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  });
}

export { DEFAULT_CONFIG };
