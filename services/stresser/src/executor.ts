import { SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import { UNMEASURED } from '@objstress/stats';
import type { OperationKind, OperationResult } from '@objstress/stats';
import type { OperationType } from './config';
import { formatError } from './logging';
import { operationDuration, operationsTotal, stresserTracer } from './observability';
import type { WorkerRng } from './random';
import type { ObjectBody, ObjectStore } from './store/types';

const elapsedMs = (start: bigint): number => Number(process.hrtime.bigint() - start) / 1_000_000;

const errorText = (error: unknown): string => formatError(error) || 'unknown error';

const record = (span: Span, result: OperationResult): OperationResult => {
  const status = result.error === '' ? 'ok' : 'error';
  operationsTotal.inc({ op: result.operation, status });
  if (result.error === '') {
    operationDuration.observe({ op: result.operation }, result.ttlbMs / 1000);
  } else {
    span.setStatus({ code: SpanStatusCode.ERROR, message: result.error });
  }
  span.setAttribute('object.bytes', result.bytesDownloaded + result.bytesUploaded);
  span.end();
  return result;
};

const failed = (operation: OperationKind, objectKey: string, timestampMs: number, error: string): OperationResult => ({
  timestampMs,
  operation,
  objectKey,
  ttfbMs: UNMEASURED,
  ttlbMs: UNMEASURED,
  bytesDownloaded: 0,
  bytesUploaded: 0,
  error,
});

/**
 * TTFB is measured as the moment the store call returns; TTLB once the body is drained.
 * A body that fails part way keeps its TTFB and the bytes read before the failure.
 */
export const performGet = async (store: ObjectStore, bucket: string, key: string): Promise<OperationResult> => {
  const timestampMs = Date.now();
  const span = stresserTracer.startSpan('object.get', { attributes: { 'object.key': key } });
  const start = process.hrtime.bigint();

  let body: ObjectBody;
  try {
    body = await store.get(bucket, key);
  } catch (error) {
    return record(span, failed('GET', key, timestampMs, errorText(error)));
  }
  const ttfbMs = elapsedMs(start);

  let bytesDownloaded = 0;
  try {
    for await (const chunk of body) {
      bytesDownloaded += chunk.byteLength;
    }
  } catch (error) {
    return record(span, {
      timestampMs,
      operation: 'GET',
      objectKey: key,
      ttfbMs,
      ttlbMs: elapsedMs(start),
      bytesDownloaded,
      bytesUploaded: 0,
      error: `body read error: ${errorText(error)}`,
    });
  }

  return record(span, {
    timestampMs,
    operation: 'GET',
    objectKey: key,
    ttfbMs,
    ttlbMs: elapsedMs(start),
    bytesDownloaded,
    bytesUploaded: 0,
    error: '',
  });
};

export const performPut = async (
  store: ObjectStore,
  bucket: string,
  key: string,
  payload: Uint8Array,
): Promise<OperationResult> => {
  const timestampMs = Date.now();
  const span = stresserTracer.startSpan('object.put', {
    attributes: { 'object.key': key, 'object.size': payload.byteLength },
  });
  const start = process.hrtime.bigint();

  try {
    await store.put(bucket, key, payload);
  } catch (error) {
    return record(span, failed('PUT', key, timestampMs, errorText(error)));
  }

  return record(span, {
    timestampMs,
    operation: 'PUT',
    objectKey: key,
    ttfbMs: UNMEASURED,
    ttlbMs: elapsedMs(start),
    bytesDownloaded: 0,
    bytesUploaded: payload.byteLength,
    error: '',
  });
};

/** Mixed mode flips a fresh coin on every call. */
export const selectOperation = (operationType: OperationType, rng: WorkerRng): OperationKind => {
  if (operationType === 'read') {
    return 'GET';
  }
  if (operationType === 'write') {
    return 'PUT';
  }
  return rng.coinFlip() ? 'GET' : 'PUT';
};
