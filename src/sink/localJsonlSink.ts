import fs from "node:fs";
import path from "node:path";
import type { DownloadOutcome, RunSummary } from "../types";
import type { AnalysisEvent, DiscoveredEvent, Sink, SinkStage } from "./types";

const STAGE_FILES: Record<SinkStage, string> = {
  discovered: "discovered.jsonl",
  download: "downloads.jsonl",
  analysis: "analyses.jsonl",
  run: "runs.jsonl",
};

/** Appends each event as one JSON line to a per-stage manifest. Empty batches write nothing. */
export class LocalJsonlSink implements Sink {
  private readonly manifestsDir: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    this.manifestsDir = path.resolve(manifestsDir);
    fs.mkdirSync(this.manifestsDir, { recursive: true });
    this.runId = runId;
  }

  manifestPath(stage: SinkStage): string {
    return path.join(this.manifestsDir, STAGE_FILES[stage]);
  }

  async publishDiscovered(items: DiscoveredEvent[]): Promise<void> {
    await this.append("discovered", items);
  }

  async publishDownloadResult(results: DownloadOutcome[]): Promise<void> {
    await this.append("download", results);
  }

  async publishAnalysisResult(results: AnalysisEvent[]): Promise<void> {
    await this.append("analysis", results);
  }

  async publishRunSummary(summary: RunSummary): Promise<void> {
    await this.append("run", [summary]);
  }

  private async append(stage: SinkStage, payloads: Array<DiscoveredEvent | DownloadOutcome | AnalysisEvent | RunSummary>): Promise<void> {
    if (payloads.length === 0) {
      return;
    }
    const content = payloads.map((payload) => JSON.stringify({ runId: this.runId, ...payload })).join("\n") + "\n";
    await fs.promises.appendFile(this.manifestPath(stage), content, "utf-8");
  }
}
