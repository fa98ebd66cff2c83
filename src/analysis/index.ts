import type { AppConfig } from "../config";
import type { Logger } from "../observability";
import { AnthropicAnalysisEngine, loadAnalysisPrompt } from "./anthropicEngine";
import { createPdfTextExtractor } from "./pdfText";
import type { AnalysisEngine } from "./types";

/** Undefined when no API key is configured. */
export function createAnalysisEngine(config: AppConfig, logger: Logger): AnalysisEngine | undefined {
  if (!config.analysisApiKey) {
    return undefined;
  }
  return new AnthropicAnalysisEngine({
    config,
    prompt: loadAnalysisPrompt(config.analysisPromptPath, logger),
    extractText: createPdfTextExtractor(),
    logger: logger.child("analysis_engine"),
  });
}

export { AnalysisDriver, collectResponseText } from "./analysisDriver";
export type { AnalysisDriverDependencies } from "./analysisDriver";
export {
  AnthropicAnalysisEngine,
  DEFAULT_PROMPT,
  loadAnalysisPrompt,
  OPINION_TEXT_SEPARATOR,
} from "./anthropicEngine";
export type { AnthropicEngineConfig, AnthropicEngineDependencies } from "./anthropicEngine";
export { ISSUE_MARKER, parseFindings } from "./findings";
export { createPdfTextExtractor, TRUNCATION_MARKER, truncateContent } from "./pdfText";
export type { TextExtractor } from "./pdfText";
export type {
  AnalysisChunk,
  AnalysisContext,
  AnalysisEngine,
  AnalysisResult,
  AnalyzeBatchOptions,
  EngineResponse,
  Findings,
  StreamedAnalysisResult,
} from "./types";
