import { ReadableStream } from "node:stream/web";
import { DEFAULT_CONFIG, type AppConfig } from "../config";
import type { SleepFn } from "../core/concurrency";
import type { FetchLike, HttpRequestInit, HttpResponseLike } from "../core/fetch";
import { SqliteLedger } from "../ledger";
import { Logger } from "../observability";
import type { AnalysisEvent, DiscoveredEvent, Sink } from "../sink";
import type { DownloadOutcome, RunSummary } from "../types";

export interface CapturedLog {
  level: string;
  msg: string;
  component: string;
  [key: string]: unknown;
}

export function captureLogger(component = "test"): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = new Logger({
    component,
    runId: "run_test",
    sink: (_level, line) => {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    baseUrl: "https://courts.test/",
    maxRetries: 3,
    retryBaseDelayMs: 100,
    documentDelayMs: 0,
    sourceDelayMs: 0,
    analysisDelayMs: 0,
    analysisApiKey: "test-secret",
    analysisApiBaseUrl: "https://engine.test",
    analysisPromptPath: "/nonexistent/prompt.txt",
    ledgerPath: ":memory:",
    ...overrides,
  };
}

export function memoryLedger(): SqliteLedger {
  return new SqliteLedger(":memory:");
}

export function pdfBytes(text = "opinion"): Buffer {
  return Buffer.from(`%PDF-1.4\n${text}\n%%EOF`, "latin1");
}

function bodyStream(chunks: readonly Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

export function fakeResponse(
  status: number,
  body: string | Buffer = "",
  options: { url?: string; headers?: Record<string, string> } = {},
): HttpResponseLike {
  const bytes = typeof body === "string" ? Buffer.from(body, "utf-8") : body;
  const headers = Object.fromEntries(Object.entries(options.headers ?? {}).map(([key, value]) => [key.toLowerCase(), value]));
  return {
    ok: status >= 200 && status < 300,
    status,
    url: options.url ?? "",
    headers: { get: (name) => headers[name.toLowerCase()] ?? null },
    body: bodyStream([bytes]),
    arrayBuffer: async () => {
      const copy = new ArrayBuffer(bytes.length);
      new Uint8Array(copy).set(bytes);
      return copy;
    },
    text: async () => bytes.toString("utf-8"),
  };
}

export type ScriptedReply = HttpResponseLike | Error;

export interface ScriptedFetch {
  fetchFn: FetchLike;
  calls: Array<{ url: string; init: HttpRequestInit }>;
  callsTo(url: string): number;
}

/**
 * Fetch that answers each URL from its own queue of replies; the last reply repeats. Unknown URLs
 * get a 404.
 */
export function scriptedFetch(routes: Record<string, ScriptedReply | ScriptedReply[]>): ScriptedFetch {
  const queues = new Map(Object.entries(routes).map(([url, replies]) => [url, Array.isArray(replies) ? [...replies] : [replies]]));
  const calls: Array<{ url: string; init: HttpRequestInit }> = [];

  const fetchFn: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const queue = queues.get(url);
    if (!queue || queue.length === 0) {
      return fakeResponse(404, "not found", { url });
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply instanceof Error) {
      throw reply;
    }
    return reply ?? fakeResponse(404, "not found", { url });
  };

  return {
    fetchFn,
    calls,
    callsTo: (url) => calls.filter((call) => call.url === url).length,
  };
}

/** Sleep that returns immediately and records every requested delay. */
export function recordingSleep(): { sleep: SleepFn; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export class RecordingSink implements Sink {
  readonly discovered: DiscoveredEvent[] = [];
  readonly downloads: DownloadOutcome[] = [];
  readonly analyses: AnalysisEvent[] = [];
  readonly runs: RunSummary[] = [];

  async publishDiscovered(items: DiscoveredEvent[]): Promise<void> {
    this.discovered.push(...items);
  }

  async publishDownloadResult(results: DownloadOutcome[]): Promise<void> {
    this.downloads.push(...results);
  }

  async publishAnalysisResult(results: AnalysisEvent[]): Promise<void> {
    this.analyses.push(...results);
  }

  async publishRunSummary(summary: RunSummary): Promise<void> {
    this.runs.push(summary);
  }
}
