import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { FileKeySource, ManifestWriter } from '@objstress/manifest';
import type { KeySource, ManifestSink } from '@objstress/manifest';
import { StatsAggregator } from '@objstress/stats';
import type { AggregateStatistics, OperationResult } from '@objstress/stats';
import { ResultChannel } from './channel';
import type { StresserConfig } from './config';
import { parseDuration } from './duration';
import { performGet, performPut, selectOperation } from './executor';
import { createKeyPicker, generateWriteKey } from './keys';
import type { KeyPicker } from './keys';
import { formatError, logDebug, logError, logInfo, logWarn } from './logging';
import { droppedResults, manifestFailures } from './observability';
import { generatePayload } from './payload';
import { WorkerRng } from './random';
import { createS3Client, S3ObjectStore } from './store/s3';
import type { ObjectStore } from './store/types';

export type RunTermination = 'deadline' | 'cancelled' | 'completed' | 'failed';

export type StressRun = {
  results: OperationResult[];
  stats: AggregateStatistics;
  termination: RunTermination;
  /** Set only when the run stopped for a reason other than its deadline or cancellation. */
  error?: Error;
};

export type StressRunDeps = {
  /** Cancels the run early, e.g. on an operator interrupt. */
  signal?: AbortSignal;
  store?: ObjectStore;
  keySource?: KeySource;
  openManifestSink?: (filePath: string) => Promise<ManifestSink>;
  channelCapacity?: number;
};

export class StressSetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(options?.cause === undefined ? message : `${message}: ${formatError(options.cause)}`, options);
    this.name = 'StressSetupError';
  }
}

type RunContext = {
  config: StresserConfig;
  store: ObjectStore;
  keys: readonly string[];
  sink: ManifestSink | null;
  channel: ResultChannel<OperationResult>;
  signal: AbortSignal;
  putSizeBytes: number;
};

const needsKeys = (config: StresserConfig): boolean => config.operationType !== 'write';

const isFixedCount = (config: StresserConfig): boolean =>
  config.operationType === 'write' && config.fileCount !== undefined;

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

/** `false` tells the worker to stop: the run was cancelled before the result could be handed off. */
const emit = (ctx: RunContext, workerId: number, result: OperationResult): boolean => {
  if (ctx.signal.aborted) {
    logDebug(`[stresser] worker ${workerId} cancelled while sending result`);
    return false;
  }
  if (!ctx.channel.trySend(result)) {
    droppedResults.inc();
    logWarn(`[stresser] worker ${workerId}: result pipeline full, dropping result`, {
      objectKey: result.objectKey,
    });
  }
  return true;
};

const recordKey = async (ctx: RunContext, key: string): Promise<void> => {
  if (!ctx.sink) {
    return;
  }
  try {
    await ctx.sink.append(key);
  } catch (error) {
    manifestFailures.inc();
    logWarn('[stresser] failed to record key in manifest', { objectKey: key, error });
  }
};

const writeObject = async (ctx: RunContext, owner: string, rng: WorkerRng): Promise<OperationResult> => {
  const key = generateWriteKey(owner, rng);
  const result = await performPut(ctx.store, ctx.config.bucket, key, generatePayload(ctx.putSizeBytes, rng));
  if (result.error === '') {
    await recordKey(ctx, key);
  }
  return result;
};

const runContinuousWorker = async (ctx: RunContext, workerId: number): Promise<void> => {
  const rng = WorkerRng.forWorker(workerId);
  const picker: KeyPicker | null =
    ctx.keys.length > 0 ? createKeyPicker(ctx.keys, workerId, ctx.config.randomize, rng) : null;
  logDebug(`[stresser] worker ${workerId} started`, { operation: ctx.config.operationType });

  while (!ctx.signal.aborted) {
    const kind = selectOperation(ctx.config.operationType, rng);
    let result: OperationResult;
    if (kind === 'GET') {
      if (!picker) {
        throw new Error(`worker ${workerId} has no keys to read`);
      }
      result = await performGet(ctx.store, ctx.config.bucket, picker.next());
    } else {
      result = await writeObject(ctx, `worker${workerId}`, rng);
    }
    if (!emit(ctx, workerId, result)) {
      return;
    }
    // Timers (the deadline among them) must get a turn even when the store answers from memory.
    await yieldToEventLoop();
  }
  logDebug(`[stresser] worker ${workerId} stopping`, { reason: 'cancelled' });
};

const runJobWorker = async (ctx: RunContext, workerId: number, takeJob: () => number | undefined): Promise<void> => {
  const rng = WorkerRng.forWorker(workerId);
  logDebug(`[stresser] job worker ${workerId} started`);
  while (!ctx.signal.aborted) {
    const jobId = takeJob();
    if (jobId === undefined) {
      logDebug(`[stresser] job worker ${workerId} finished, queue empty`);
      return;
    }
    const result = await writeObject(ctx, `job${jobId}`, rng);
    if (!emit(ctx, workerId, result)) {
      return;
    }
    await yieldToEventLoop();
  }
};

const createJobQueue = (count: number): (() => number | undefined) => {
  const jobs = Array.from({ length: count }, (_, index) => index);
  let cursor = 0;
  return () => {
    if (cursor >= jobs.length) {
      return undefined;
    }
    const job = jobs[cursor];
    cursor += 1;
    return job;
  };
};

/** Node timers hold at most 2^31-1 ms; longer deadlines are reached through successive timers. */
export const MAX_TIMER_MS = 2_147_483_647;

export const armDeadline = (durationMs: number, onExpire: () => void): (() => void) => {
  const expiresAt = Date.now() + durationMs;
  let timer: NodeJS.Timeout;
  const schedule = (remainingMs: number): void => {
    if (remainingMs <= MAX_TIMER_MS) {
      timer = setTimeout(onExpire, Math.max(0, remainingMs));
      return;
    }
    timer = setTimeout(() => schedule(expiresAt - Date.now()), MAX_TIMER_MS);
  };
  schedule(durationMs);
  return () => clearTimeout(timer);
};

const loadKeys = async (config: StresserConfig, source: KeySource | undefined): Promise<string[]> => {
  if (!needsKeys(config)) {
    logInfo(`[stresser] write-only mode, new keys will be generated (manifest ${config.manifestPath} is not read)`);
    return [];
  }
  let keys: string[];
  try {
    keys = await (source ?? new FileKeySource(config.manifestPath)).load();
  } catch (error) {
    throw new StressSetupError('failed to load manifest for read/mixed mode', { cause: error });
  }
  if (keys.length === 0) {
    throw new StressSetupError('failed to load manifest for read/mixed mode', {
      cause: new Error(`no object keys available from ${config.manifestPath}`),
    });
  }
  logInfo(`[stresser] loaded ${keys.length} object keys from manifest ${config.manifestPath}`);
  return keys;
};

const openStore = (config: StresserConfig, store: ObjectStore | undefined): { store: ObjectStore; owned: boolean } => {
  if (store) {
    return { store, owned: false };
  }
  try {
    return { store: new S3ObjectStore(createS3Client(config)), owned: true };
  } catch (error) {
    throw new StressSetupError('failed to create S3 client', { cause: error });
  }
};

const openSink = async (
  config: StresserConfig,
  open: ((filePath: string) => Promise<ManifestSink>) | undefined,
): Promise<ManifestSink | null> => {
  if (config.operationType !== 'write' || !config.generateManifest) {
    return null;
  }
  try {
    const sink = await (open ?? ManifestWriter.create)(config.manifestPath);
    logInfo(`[stresser] recording generated keys in ${config.manifestPath}`);
    return sink;
  } catch (error) {
    throw new StressSetupError('failed to open manifest for writing', { cause: error });
  }
};

/**
 * Drives `concurrency` workers against the store until the deadline, cancellation, or
 * (in fixed-count write mode) an empty job queue. Setup problems throw
 * `StressSetupError` before any worker starts; every other ending returns the results
 * collected so far.
 */
export const runStressTest = async (config: StresserConfig, deps: StressRunDeps = {}): Promise<StressRun> => {
  let durationMs: number;
  try {
    durationMs = parseDuration(config.duration);
  } catch (error) {
    throw new StressSetupError(`invalid duration format "${config.duration}"`, { cause: error });
  }

  const keys = await loadKeys(config, deps.keySource);
  const { store, owned } = openStore(config, deps.store);
  let sink: ManifestSink | null;
  try {
    sink = await openSink(config, deps.openManifestSink);
  } catch (error) {
    if (owned) {
      store.close?.();
    }
    throw error;
  }

  const controller = new AbortController();
  let termination: RunTermination | null = null;
  let failure: Error | undefined;
  const stop = (reason: RunTermination, error?: Error): void => {
    if (controller.signal.aborted) {
      return;
    }
    termination = reason;
    failure = error;
    controller.abort(error);
  };

  const external = deps.signal;
  const onExternalAbort = (): void => {
    const reason: unknown = external?.reason;
    stop(reason instanceof Error && reason.name === 'TimeoutError' ? 'deadline' : 'cancelled');
  };
  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const fixedCount = isFixedCount(config);
  const cancelDeadline = fixedCount ? null : armDeadline(durationMs, () => stop('deadline'));

  const concurrency = config.concurrency;
  const channel = new ResultChannel<OperationResult>(deps.channelCapacity ?? concurrency * 2);
  const ctx: RunContext = {
    config,
    store,
    keys,
    sink,
    channel,
    signal: controller.signal,
    putSizeBytes: config.putSizeKB * 1024,
  };

  const aggregator = new StatsAggregator(concurrency);
  const results: OperationResult[] = [];
  const consumer = (async () => {
    for await (const result of channel) {
      results.push(result);
      aggregator.add(result);
    }
  })();

  logInfo('[stresser] starting stress test', {
    concurrency,
    durationMs: fixedCount ? undefined : durationMs,
    operation: config.operationType,
    randomize: config.randomize,
    putSizeKB: config.putSizeKB,
    fileCount: fixedCount ? config.fileCount : undefined,
  });

  const startedAtMs = Date.now();
  const takeJob = fixedCount ? createJobQueue(config.fileCount ?? 0) : null;
  const guard = async (workerId: number, work: Promise<void>): Promise<void> => {
    try {
      await work;
    } catch (error) {
      logError(`[stresser] worker ${workerId} failed`, error);
      stop('failed', toError(error));
    }
  };
  const workers: Promise<void>[] = [];
  for (let workerId = 0; workerId < concurrency; workerId += 1) {
    const work = takeJob ? runJobWorker(ctx, workerId, takeJob) : runContinuousWorker(ctx, workerId);
    workers.push(guard(workerId, work));
  }

  await Promise.all(workers);
  channel.close();
  logInfo('[stresser] all workers finished');
  await consumer;
  const endedAtMs = Date.now();

  cancelDeadline?.();
  external?.removeEventListener('abort', onExternalAbort);
  if (owned) {
    store.close?.();
  }
  if (sink) {
    try {
      await sink.close();
    } catch (error) {
      logError('[stresser] failed to close manifest', error);
      failure = failure ?? toError(error);
    }
  }

  const stats = aggregator.finalize(startedAtMs, endedAtMs);
  logInfo(`[stresser] collected ${results.length} results`);
  return {
    results,
    stats,
    termination: termination ?? 'completed',
    error: failure,
  };
};
