import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

function summarize(samples: readonly number[]): TimerSummary {
  if (samples.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0 };
  }
  const total = samples.reduce((sum, value) => sum + value, 0);
  return {
    count: samples.length,
    min: Math.min(...samples),
    max: Math.max(...samples),
    avg: Number((total / samples.length).toFixed(2)),
  };
}

/** In-process counters and duration samples for one CLI invocation. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly samples = new Map<MetricTimerName, number[]>();

  constructor(private readonly clock: () => number = Date.now) {}

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.clock();
    return () => {
      const elapsedMs = this.clock() - startedAt;
      this.samples.set(name, [...(this.samples.get(name) ?? []), elapsedMs]);
      return elapsedMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    const count = (name: MetricCounterName): number => this.counters.get(name) ?? 0;
    return {
      sources_checked: count("sources_checked"),
      sources_failed: count("sources_failed"),
      opinions_discovered: count("opinions_discovered"),
      downloads_ok: count("downloads_ok"),
      downloads_failed: count("downloads_failed"),
      analyses_ok: count("analyses_ok"),
      analyses_failed: count("analyses_failed"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    const timer = (name: MetricTimerName): TimerSummary => summarize(this.samples.get(name) ?? []);
    return {
      listing_fetch_ms: timer("listing_fetch_ms"),
      download_ms: timer("download_ms"),
      analysis_ms: timer("analysis_ms"),
    };
  }

  snapshot(): MetricsSnapshot {
    return { counters: this.getCounters(), timers: this.getTimerSummaries() };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          ...this.snapshot(),
        },
        null,
        2,
      ),
    );
  }
}
