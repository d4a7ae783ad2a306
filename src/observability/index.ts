export * from "./types";
export { Logger, createSilentLogger, parseLogLevel } from "./logger";
export type { LoggerContext } from "./logger";
export { MetricsRegistry } from "./metrics";
export type { MetricsSummary } from "./metrics";
export { createRunId } from "./runId";
