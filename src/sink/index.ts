import type { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import { LocalJsonlSink } from "./localJsonlSink";
import type { Sink, SinkStage } from "./types";

export function createSink(config: Pick<AppConfig, "sinkType" | "outputDirs">, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.outputDirs.manifests, runId);
  }
}

/**
 * Runs a sink call and logs a failure instead of raising it. Ledger state is the record of truth;
 * a lost sink event never changes it.
 */
export async function publishSafely(logger: Logger, stage: SinkStage, publish: () => Promise<void>): Promise<boolean> {
  try {
    await publish();
    return true;
  } catch (error) {
    logger.warn("sink_publish_failed", { stage, error: errorMessage(error) });
    return false;
  }
}

export { LocalJsonlSink } from "./localJsonlSink";
export type { AnalysisEvent, DiscoveredEvent, Sink, SinkStage } from "./types";
