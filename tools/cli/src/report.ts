import { writeFile } from 'node:fs/promises';
import { isMeasured } from '@objstress/stats';
import type { AggregateStatistics, LatencySummary, OperationResult } from '@objstress/stats';

const MIB = 1024 * 1024;

const fixed = (value: number): string => value.toFixed(2);

const cell = (valueMs: number): string => fixed(valueMs).padStart(7);

/** Elapsed time rounded to the millisecond, e.g. `850ms`, `2.5s`, `1m0.25s`, `1h2m3s`. */
export const formatElapsed = (durationMs: number): string => {
  const total = Math.max(0, Math.round(durationMs));
  if (total < 1000) {
    return `${total}ms`;
  }
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = (total % 60_000) / 1000;
  const secondsText = `${Number.parseFloat(seconds.toFixed(3))}s`;
  if (hours > 0) {
    return `${hours}h${minutes}m${secondsText}`;
  }
  if (minutes > 0) {
    return `${minutes}m${secondsText}`;
  }
  return secondsText;
};

const latencyRow = (label: string, summary: LatencySummary): string => {
  const cells = [summary.minMs, summary.avgMs, summary.p50Ms, summary.p90Ms, summary.p99Ms, summary.maxMs];
  return `  ${label.padEnd(14)}|${cells.map(cell).join(' |')} `;
};

const LATENCY_HEADER = [
  '  Latency (ms): |   Min  |   Avg  |   P50  |   P90  |   P99  |   Max  ',
  '  --------------|--------|--------|--------|--------|--------|--------',
];

export const formatSummary = (stats: AggregateStatistics): string => {
  const mibPerSecond = (bytesPerSecond: number): number => bytesPerSecond / MIB;
  const lines: string[] = [
    '',
    `--- Stress Test Summary --- (${formatElapsed(stats.durationMs)}) ---`,
    'Overall:',
    `  Concurrency:    ${stats.concurrency}`,
    `  Total Requests: ${stats.totalRequests} (${fixed(stats.requestsPerSecond)} req/s)`,
    `  Total Success:  ${stats.totalSuccesses}`,
    `  Total Errors:   ${stats.totalErrors}`,
    '',
    `GET Operations (${stats.totalGets} total):`,
    `  Success:        ${stats.successfulGets}`,
    `  Bytes D/L:      ${stats.totalBytesDown} (${fixed(stats.totalBytesDown / MIB)} MiB)`,
    `  Avg Throughput: ${fixed(mibPerSecond(stats.downloadBytesPerSecond))} MiB/s`,
  ];

  if (stats.successfulGets > 0) {
    lines.push(...LATENCY_HEADER, latencyRow('TTFB (proxy)', stats.getTtfb), latencyRow('TTLB (body)', stats.getTtlb));
  } else {
    lines.push('  No successful GETs to calculate latency.');
  }

  lines.push(
    '',
    `PUT Operations (${stats.totalPuts} total):`,
    `  Success:        ${stats.successfulPuts}`,
    `  Bytes U/L:      ${stats.totalBytesUp} (${fixed(stats.totalBytesUp / MIB)} MiB)`,
  );
  if (stats.successfulPuts > 0) {
    lines.push(`  Object Size:    ${fixed(stats.totalBytesUp / stats.successfulPuts / 1024)} KiB`);
  }
  lines.push(`  Avg Throughput: ${fixed(mibPerSecond(stats.uploadBytesPerSecond))} MiB/s`);

  if (stats.successfulPuts > 0) {
    lines.push(...LATENCY_HEADER, latencyRow('TTLB (total)', stats.putTtlb));
  } else {
    lines.push('  No successful PUTs to calculate latency.');
  }
  lines.push('----------------------------------------');
  return `${lines.join('\n')}\n`;
};

export const CSV_HEADER = [
  'Timestamp',
  'Operation',
  'ObjectKey',
  'TTFB(ms)',
  'TTLB(ms)',
  'BytesDownloaded',
  'BytesUploaded',
  'Error',
] as const;

/** Quote when the field holds a delimiter, quote or line break, or starts with whitespace. */
export const csvField = (value: string): string => {
  if (!/[",\r\n]/.test(value) && !/^[ \t]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
};

const millis = (valueMs: number): string => (isMeasured(valueMs) ? valueMs.toFixed(3) : '0.000');

export const formatResultRow = (result: OperationResult): string => {
  return [
    new Date(result.timestampMs).toISOString(),
    result.operation,
    result.objectKey,
    millis(result.ttfbMs),
    millis(result.ttlbMs),
    String(result.bytesDownloaded),
    String(result.bytesUploaded),
    result.error,
  ]
    .map(csvField)
    .join(',');
};

export const formatResultsCsv = (results: readonly OperationResult[]): string => {
  const rows = [CSV_HEADER.join(','), ...results.map(formatResultRow)];
  return `${rows.join('\n')}\n`;
};

export const writeResultsCsv = async (results: readonly OperationResult[], filePath: string): Promise<void> => {
  try {
    await writeFile(filePath, formatResultsCsv(results), 'utf8');
  } catch (error) {
    throw new Error(`failed to write results csv ${filePath}`, { cause: error });
  }
};
