export { Logger } from "./logger";
export type { LoggerContext, LogSink } from "./logger";
export { MetricsRegistry } from "./metrics";
export type { MetricsSnapshot, TimerSummary } from "./metrics";
export { createRunId } from "./runId";
export type { LogFields, LogLevel, MetricCounterName, MetricTimerName } from "./types";
