import fs from "node:fs";
import { createAnthropic } from "@ai-sdk/anthropic";
import { APICallError, generateText, type LanguageModel, RetryError, streamText } from "ai";
import { z } from "zod";
import type { AppConfig } from "../config";
import { AnalysisEngineError, errorMessage, OperationCancelledError } from "../core/errors";
import { timeoutSignal } from "../core/fetch";
import type { Logger } from "../observability";
import { type TextExtractor, truncateContent } from "./pdfText";
import type { AnalysisChunk, AnalysisContext, AnalysisEngine, EngineResponse } from "./types";

export const OPINION_TEXT_SEPARATOR = "\n\n--- OPINION TEXT ---\n";
export const DEFAULT_PROMPT = "Analyze this legal opinion for interesting legal issues.";

/** Error body the Messages API puts in an `error` stream event. */
const StreamErrorSchema = z.object({ type: z.string(), message: z.string() });

const RATE_LIMIT_STATUSES = new Set([429, 529]);
const RATE_LIMIT_ERROR_TYPES = new Set(["rate_limit_error", "overloaded_error"]);

export type AnthropicEngineConfig = Pick<
  AppConfig,
  | "analysisApiKey"
  | "analysisApiBaseUrl"
  | "analysisModel"
  | "analysisMaxTokens"
  | "analysisStreaming"
  | "analysisMaxContentChars"
  | "analysisTimeoutMs"
>;

export interface AnthropicEngineDependencies {
  config: AnthropicEngineConfig;
  prompt: string;
  extractText: TextExtractor;
  logger: Logger;
  /** Passed to the provider in place of the global fetch. */
  fetch?: typeof globalThis.fetch;
}

interface PendingRequest {
  signal: AbortSignal;
  dispose: () => void;
}

export function loadAnalysisPrompt(promptPath: string, logger: Logger): string {
  if (!fs.existsSync(promptPath)) {
    logger.warn("analysis_prompt_missing", { path: promptPath });
    return DEFAULT_PROMPT;
  }
  const prompt = fs.readFileSync(promptPath, "utf-8").trim();
  return prompt.length > 0 ? prompt : DEFAULT_PROMPT;
}

/** `https://api.anthropic.com` -> `https://api.anthropic.com/v1` */
function providerBaseUrl(apiBaseUrl: string): string {
  const trimmed = apiBaseUrl.replace(/\/+$/, "");
  return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}

function toEngineError(error: unknown): AnalysisEngineError {
  if (error instanceof AnalysisEngineError) {
    return error;
  }
  if (RetryError.isInstance(error)) {
    return toEngineError(error.lastError);
  }
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    const detail = (error.responseBody ?? error.message).slice(0, 500);
    if (status !== undefined && RATE_LIMIT_STATUSES.has(status)) {
      return new AnalysisEngineError("rate_limited", `analysis engine rate limited the request: ${detail}`, error);
    }
    if (status !== undefined && status >= 200 && status < 300) {
      return new AnalysisEngineError("malformed_response", `analysis response has an unexpected shape: ${error.message}`, error);
    }
    if (status === undefined) {
      return new AnalysisEngineError("http_error", `analysis request failed: ${error.message}`, error);
    }
    return new AnalysisEngineError("http_error", `analysis engine returned HTTP ${status}: ${detail}`, error);
  }

  const streamError = StreamErrorSchema.safeParse(error);
  if (streamError.success) {
    const { type, message } = streamError.data;
    const code = RATE_LIMIT_ERROR_TYPES.has(type) ? "rate_limited" : "stream_error";
    return new AnalysisEngineError(code, `analysis stream failed: ${type}: ${message}`);
  }
  return new AnalysisEngineError("http_error", `analysis request failed: ${errorMessage(error)}`, error);
}

/** Analyzes one opinion per call through the Anthropic provider of the AI SDK. */
export class AnthropicAnalysisEngine implements AnalysisEngine {
  private readonly deps: AnthropicEngineDependencies;
  private readonly languageModel: LanguageModel;

  constructor(deps: AnthropicEngineDependencies) {
    this.deps = deps;
    const provider = createAnthropic({
      apiKey: deps.config.analysisApiKey,
      baseURL: providerBaseUrl(deps.config.analysisApiBaseUrl),
      fetch: deps.fetch,
    });
    this.languageModel = provider(deps.config.analysisModel);
  }

  get model(): string {
    return this.deps.config.analysisModel;
  }

  async analyze(bytes: Buffer, context: AnalysisContext): Promise<EngineResponse> {
    const { config, logger } = this.deps;
    if (!config.analysisApiKey) {
      throw new AnalysisEngineError("not_configured", "no API key configured for the analysis engine");
    }

    let text: string;
    try {
      text = await this.deps.extractText(bytes);
    } catch (error) {
      throw new AnalysisEngineError("no_text", `could not extract text from ${context.caseNumber}: ${errorMessage(error)}`, error);
    }
    if (text.length === 0) {
      throw new AnalysisEngineError("no_text", `no extractable text in ${context.caseNumber}`);
    }

    const content = truncateContent(text, config.analysisMaxContentChars);
    if (content.truncated) {
      logger.warn("analysis_content_truncated", {
        opinionId: context.opinionId,
        caseNumber: context.caseNumber,
        originalChars: text.length,
        maxChars: config.analysisMaxContentChars,
      });
    }

    const prompt = `${this.deps.prompt}${OPINION_TEXT_SEPARATOR}${content.text}`;
    const request = timeoutSignal(config.analysisTimeoutMs, context.signal);
    if (config.analysisStreaming) {
      return { kind: "stream", model: this.model, chunks: this.stream(prompt, context, request) };
    }

    try {
      const result = await generateText({
        model: this.languageModel,
        prompt,
        maxOutputTokens: config.analysisMaxTokens,
        maxRetries: 0,
        abortSignal: request.signal,
      });
      return { kind: "complete", model: result.response.modelId || this.model, text: result.text };
    } catch (error) {
      throw this.translate(error, context, request.signal);
    } finally {
      request.dispose();
    }
  }

  private async *stream(prompt: string, context: AnalysisContext, request: PendingRequest): AsyncGenerator<AnalysisChunk> {
    const { config, logger } = this.deps;
    const outcome: { failure?: { error: unknown } } = {};

    try {
      const result = streamText({
        model: this.languageModel,
        prompt,
        maxOutputTokens: config.analysisMaxTokens,
        maxRetries: 0,
        abortSignal: request.signal,
        onError: ({ error }) => {
          outcome.failure ??= { error };
          logger.debug("analysis_stream_error", { opinionId: context.opinionId, error: errorMessage(error) });
        },
      });

      for await (const delta of result.textStream) {
        if (outcome.failure) {
          break;
        }
        if (delta.length > 0) {
          yield { type: "delta", text: delta };
        }
      }

      if (request.signal.aborted) {
        throw this.translate(new Error("analysis request aborted"), context, request.signal);
      }
      if (outcome.failure) {
        throw this.translate(outcome.failure.error, context, request.signal);
      }

      const finishReason = await result.finishReason;
      if (finishReason === "unknown" || finishReason === "error") {
        throw new AnalysisEngineError("stream_error", "analysis stream ended before the engine finished its message");
      }
      yield { type: "done", model: this.model, stopReason: finishReason };
    } catch (error) {
      throw this.translate(error, context, request.signal);
    } finally {
      request.dispose();
    }
  }

  private translate(error: unknown, context: AnalysisContext, requestSignal: AbortSignal): Error {
    if (error instanceof AnalysisEngineError || error instanceof OperationCancelledError) {
      return error;
    }
    if (context.signal?.aborted) {
      return new OperationCancelledError(`analysis of ${context.caseNumber} cancelled`);
    }
    if (requestSignal.aborted) {
      return new AnalysisEngineError("timeout", `analysis of ${context.caseNumber} timed out`, error);
    }
    return toEngineError(error);
  }
}
