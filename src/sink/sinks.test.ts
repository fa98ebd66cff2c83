import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { captureLogger } from "../testing/fakes";
import type { RunSummary } from "../types";
import { createSink, publishSafely } from "./index";
import { LocalJsonlSink } from "./localJsonlSink";
import type { DiscoveredEvent } from "./types";

function discovered(opinionId: number): DiscoveredEvent {
  return {
    opinionId,
    sourceId: "coa01",
    caseNumber: `01-24-0000${opinionId}-CR`,
    opinionType: "op",
    publicationDate: "2025-07-24",
    listingUrl: "https://courts.test/Docket.aspx?coa=coa01&FullDate=07/24/2025",
    discoveredAt: "2025-07-25T08:00:00.000Z",
  };
}

const summary: RunSummary = {
  runId: "run_x",
  mode: "scrape_only",
  targetDate: "2025-07-24",
  startedAt: "2025-07-25T08:00:00.000Z",
  finishedAt: "2025-07-25T08:05:00.000Z",
  sourcesChecked: 1,
  sourcesFailed: 0,
  opinionsDiscovered: 2,
  opinionsDownloaded: 1,
  opinionsFailed: 1,
  analysesCompleted: 0,
  analysesFailed: 0,
  outcome: "partial_failure",
};

describe("LocalJsonlSink", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "manifests-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("appends one line per event tagged with the run id", async () => {
    const sink = new LocalJsonlSink(workDir, "run_x");
    await sink.publishDiscovered([discovered(1), discovered(2)]);
    await sink.publishDiscovered([]);
    await sink.publishRunSummary(summary);

    const lines = fs.readFileSync(sink.manifestPath("discovered"), "utf-8").trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).opinionId)).toEqual([1, 2]);
    expect(JSON.parse(lines[0]).runId).toBe("run_x");
    expect(JSON.parse(fs.readFileSync(path.join(workDir, "runs.jsonl"), "utf-8"))).toMatchObject({ runId: "run_x", outcome: "partial_failure" });
    expect(fs.existsSync(sink.manifestPath("download"))).toBe(false);
  });

  it("is what createSink builds by default", () => {
    const sink = createSink({ sinkType: "local_jsonl", outputDirs: { opinions: workDir, reports: workDir, manifests: workDir } }, "run_x");
    expect(sink).toBeInstanceOf(LocalJsonlSink);
  });
});

describe("publishSafely", () => {
  it("logs a failed publish instead of raising it", async () => {
    const { logger, lines } = captureLogger();

    const ok = await publishSafely(logger, "run", async () => {
      throw new Error("broker down");
    });

    expect(ok).toBe(false);
    expect(lines).toEqual([expect.objectContaining({ level: "warn", msg: "sink_publish_failed", stage: "run", error: "broker down" })]);
  });
});
