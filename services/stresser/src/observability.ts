import { Counter, Histogram, Registry } from 'prom-client';
import { trace } from '@opentelemetry/api';

export const stresserRegistry = new Registry();

export const operationsTotal = new Counter({
  name: 'stresser_operations_total',
  help: 'Object-store operations attempted by stress workers',
  labelNames: ['op', 'status'],
  registers: [stresserRegistry],
});

export const operationDuration = new Histogram({
  name: 'stresser_operation_duration_seconds',
  help: 'Time to last byte of successful object-store operations',
  labelNames: ['op'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [stresserRegistry],
});

export const droppedResults = new Counter({
  name: 'stresser_dropped_results_total',
  help: 'Results discarded because the result pipeline was full',
  registers: [stresserRegistry],
});

export const manifestFailures = new Counter({
  name: 'stresser_manifest_write_failures_total',
  help: 'Generated keys that could not be appended to the manifest',
  registers: [stresserRegistry],
});

export const stresserTracer = trace.getTracer('stresser');

export const renderMetrics = (): Promise<string> => stresserRegistry.metrics();
