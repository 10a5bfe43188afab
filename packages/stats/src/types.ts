export type OperationKind = 'GET' | 'PUT';

/** Marks a timing that was never measured (failed call, or TTFB on a PUT). */
export const UNMEASURED = -1;

/**
 * Outcome of one attempted operation. Timings are milliseconds; `error` is empty on success.
 */
export type OperationResult = {
  readonly timestampMs: number;
  readonly operation: OperationKind;
  readonly objectKey: string;
  readonly ttfbMs: number;
  readonly ttlbMs: number;
  readonly bytesDownloaded: number;
  readonly bytesUploaded: number;
  readonly error: string;
};

export type LatencySummary = {
  /** Successful-operation samples, sorted ascending. */
  readonly samplesMs: readonly number[];
  readonly count: number;
  readonly minMs: number;
  readonly avgMs: number;
  readonly p50Ms: number;
  readonly p90Ms: number;
  readonly p99Ms: number;
  readonly maxMs: number;
};

export type AggregateStatistics = {
  readonly concurrency: number;
  readonly totalRequests: number;
  readonly totalGets: number;
  readonly totalPuts: number;
  readonly totalSuccesses: number;
  readonly totalErrors: number;
  readonly successfulGets: number;
  readonly successfulPuts: number;
  readonly failedGets: number;
  readonly failedPuts: number;
  readonly totalBytesDown: number;
  readonly totalBytesUp: number;
  readonly startedAtMs: number;
  readonly endedAtMs: number;
  readonly durationMs: number;
  readonly requestsPerSecond: number;
  readonly downloadBytesPerSecond: number;
  readonly uploadBytesPerSecond: number;
  readonly getTtfb: LatencySummary;
  readonly getTtlb: LatencySummary;
  readonly putTtlb: LatencySummary;
};
