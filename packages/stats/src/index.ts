import type { AggregateStatistics, LatencySummary, OperationResult } from './types';
import { UNMEASURED } from './types';

export const PERCENTILES = [50, 90, 99] as const;

/**
 * Nearest-rank percentile over an ascending sample set. One sample answers every
 * percentile; two samples split at P50 (lower) versus anything above (upper).
 */
export const percentile = (sorted: readonly number[], percentileValue: number): number => {
  const count = sorted.length;
  if (count === 0) {
    return 0;
  }
  if (count === 1) {
    return sorted[0];
  }
  if (count === 2) {
    return percentileValue <= 50 ? sorted[0] : sorted[1];
  }
  const index = Math.min(count - 1, Math.max(0, Math.floor((percentileValue * count) / 100)));
  return sorted[index];
};

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

/** Per-second rate of `total` over `durationMs`; zero for a non-positive span. */
export const computeRate = (total: number, durationMs: number): number => {
  if (!(durationMs > 0)) {
    return 0;
  }
  return total / (durationMs / 1000);
};

export const summarizeLatencies = (samples: readonly number[]): LatencySummary => {
  const sorted = Object.freeze([...samples].sort((a, b) => a - b));
  if (sorted.length === 0) {
    return Object.freeze({
      samplesMs: sorted,
      count: 0,
      minMs: 0,
      avgMs: 0,
      p50Ms: 0,
      p90Ms: 0,
      p99Ms: 0,
      maxMs: 0,
    });
  }
  return Object.freeze({
    samplesMs: sorted,
    count: sorted.length,
    minMs: sorted[0],
    avgMs: mean(sorted),
    p50Ms: percentile(sorted, 50),
    p90Ms: percentile(sorted, 90),
    p99Ms: percentile(sorted, 99),
    maxMs: sorted[sorted.length - 1],
  });
};

export const isMeasured = (valueMs: number): boolean => valueMs !== UNMEASURED;

type Counters = {
  totalRequests: number;
  totalGets: number;
  totalPuts: number;
  totalErrors: number;
  failedGets: number;
  failedPuts: number;
  totalBytesDown: number;
  totalBytesUp: number;
};

/**
 * Single-consumer accumulator. Results are added while the run is collecting;
 * `finalize` sorts the distributions once and freezes the outcome.
 */
export class StatsAggregator {
  private counters: Counters = {
    totalRequests: 0,
    totalGets: 0,
    totalPuts: 0,
    totalErrors: 0,
    failedGets: 0,
    failedPuts: 0,
    totalBytesDown: 0,
    totalBytesUp: 0,
  };
  private getTtfbs: number[] = [];
  private getTtlbs: number[] = [];
  private putTtlbs: number[] = [];
  private concurrency: number;
  private finalized = false;

  constructor(concurrency = 0) {
    this.concurrency = concurrency;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  get totalRequests(): number {
    return this.counters.totalRequests;
  }

  add(result: OperationResult): void {
    if (this.finalized) {
      throw new Error('statistics already finalized');
    }
    const counters = this.counters;
    counters.totalRequests += 1;
    const isGet = result.operation === 'GET';
    if (isGet) {
      counters.totalGets += 1;
    } else {
      counters.totalPuts += 1;
    }

    if (result.error !== '') {
      counters.totalErrors += 1;
      if (isGet) {
        counters.failedGets += 1;
      } else {
        counters.failedPuts += 1;
      }
      return;
    }

    if (isGet) {
      counters.totalBytesDown += result.bytesDownloaded;
      this.getTtfbs.push(result.ttfbMs);
      this.getTtlbs.push(result.ttlbMs);
      return;
    }
    counters.totalBytesUp += result.bytesUploaded;
    this.putTtlbs.push(result.ttlbMs);
  }

  finalize(startedAtMs: number, endedAtMs: number): AggregateStatistics {
    if (this.finalized) {
      throw new Error('statistics already finalized');
    }
    this.finalized = true;

    const counters = this.counters;
    const durationMs = endedAtMs - startedAtMs;
    return Object.freeze({
      concurrency: this.concurrency,
      totalRequests: counters.totalRequests,
      totalGets: counters.totalGets,
      totalPuts: counters.totalPuts,
      totalSuccesses: counters.totalRequests - counters.totalErrors,
      totalErrors: counters.totalErrors,
      successfulGets: counters.totalGets - counters.failedGets,
      successfulPuts: counters.totalPuts - counters.failedPuts,
      failedGets: counters.failedGets,
      failedPuts: counters.failedPuts,
      totalBytesDown: counters.totalBytesDown,
      totalBytesUp: counters.totalBytesUp,
      startedAtMs,
      endedAtMs,
      durationMs,
      requestsPerSecond: computeRate(counters.totalRequests, durationMs),
      downloadBytesPerSecond: computeRate(counters.totalBytesDown, durationMs),
      uploadBytesPerSecond: computeRate(counters.totalBytesUp, durationMs),
      getTtfb: summarizeLatencies(this.getTtfbs),
      getTtlb: summarizeLatencies(this.getTtlbs),
      putTtlb: summarizeLatencies(this.putTtlbs),
    });
  }
}

/** Aggregate an already-collected result log in one pass. */
export const aggregateResults = (
  results: readonly OperationResult[],
  startedAtMs: number,
  endedAtMs: number,
  concurrency = 0,
): AggregateStatistics => {
  const aggregator = new StatsAggregator(concurrency);
  for (const result of results) {
    aggregator.add(result);
  }
  return aggregator.finalize(startedAtMs, endedAtMs);
};

export { UNMEASURED } from './types';
export type {
  AggregateStatistics,
  LatencySummary,
  OperationKind,
  OperationResult,
} from './types';
