import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { loadManifest } from '@objstress/manifest';
import type { KeySource, ManifestSink } from '@objstress/manifest';
import { UNMEASURED } from '@objstress/stats';
import type { StresserConfig } from '../src/config';
import { setLogLevel } from '../src/logging';
import { droppedResults, manifestFailures } from '../src/observability';
import { armDeadline, runStressTest, StressSetupError } from '../src/runner';
import type { ObjectBody, ObjectStore } from '../src/store/types';
import { MemoryObjectStore } from './helpers/memory-store';

setLogLevel('error');

const makeConfig = (overrides: Partial<StresserConfig> = {}): StresserConfig => ({
  endpoint: 'http://localhost:9000',
  region: 'us-east-1',
  bucket: 'bench',
  accessKey: undefined,
  secretKey: undefined,
  insecureSkipVerify: false,
  duration: '200ms',
  concurrency: 3,
  randomize: false,
  manifestPath: 'unused-manifest.txt',
  outputFile: 'unused.csv',
  operationType: 'read',
  putSizeKB: 1,
  fileCount: undefined,
  generateManifest: false,
  logLevel: 'error',
  ...overrides,
});

const staticKeys = (keys: string[]): KeySource => ({
  load: async () => keys,
});

const seededStore = (options: ConstructorParameters<typeof MemoryObjectStore>[0] = {}): MemoryObjectStore => {
  const store = new MemoryObjectStore(options);
  store.seed('bench', { k0: 'zero', k1: 'one!', k2: 'two' });
  return store;
};

test('read run stops at its deadline with consistent totals', async () => {
  const store = seededStore();
  const run = await runStressTest(makeConfig(), { store, keySource: staticKeys(['k0', 'k1', 'k2']) });

  assert.equal(run.termination, 'deadline');
  assert.equal(run.error, undefined);
  assert.ok(run.results.length > 0);
  const { stats } = run;
  assert.equal(stats.totalRequests, run.results.length);
  assert.equal(stats.totalRequests, stats.totalGets + stats.totalPuts);
  assert.equal(stats.totalRequests, stats.totalSuccesses + stats.totalErrors);
  assert.equal(stats.totalPuts, 0);
  assert.equal(stats.totalErrors, 0);
  for (const result of run.results) {
    assert.ok(['k0', 'k1', 'k2'].includes(result.objectKey));
    for (const value of [result.ttfbMs, result.ttlbMs]) {
      assert.ok(value === UNMEASURED || value >= 0);
    }
  }
  assert.equal(store.closed, false);
});

test('a single sequential reader walks the key list in order', async () => {
  const run = await runStressTest(makeConfig({ concurrency: 1, duration: '100ms' }), {
    store: seededStore(),
    keySource: staticKeys(['k0', 'k1', 'k2']),
  });
  assert.ok(run.results.length >= 4);
  assert.deepEqual(
    run.results.slice(0, 4).map((result) => result.objectKey),
    ['k0', 'k1', 'k2', 'k0'],
  );
});

test('cancelling a long run returns promptly with partial results', async () => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), 200);
  const startedAt = Date.now();

  const run = await runStressTest(makeConfig({ duration: '10m' }), {
    store: seededStore({ delayMs: 20 }),
    keySource: staticKeys(['k0', 'k1', 'k2']),
    signal: controller.signal,
  });
  clearTimeout(timer);

  assert.ok(Date.now() - startedAt < 2_000);
  assert.equal(run.termination, 'cancelled');
  assert.equal(run.error, undefined);
  assert.ok(run.results.length > 0);
  assert.equal(run.stats.totalRequests, run.results.length);
});

test('an already-aborted signal yields an empty, well-defined report', async () => {
  const run = await runStressTest(makeConfig({ duration: '10m' }), {
    store: seededStore(),
    keySource: staticKeys(['k0']),
    signal: AbortSignal.abort(),
  });
  assert.equal(run.termination, 'cancelled');
  assert.deepEqual(run.results, []);
  assert.equal(run.stats.totalRequests, 0);
  assert.equal(run.stats.getTtfb.p99Ms, 0);
});

test('failed reads are counted as errors and excluded from latency samples', async () => {
  const run = await runStressTest(makeConfig({ duration: '100ms' }), {
    store: seededStore(),
    keySource: staticKeys(['k0', 'absent']),
  });
  const failures = run.results.filter((result) => result.error !== '');
  assert.ok(failures.length > 0);
  assert.ok(failures.every((result) => result.objectKey === 'absent'));
  assert.equal(run.stats.totalErrors, failures.length);
  assert.equal(run.stats.getTtfb.count, run.results.length - failures.length);
});

test('mixed runs issue both reads and writes', async () => {
  const store = seededStore();
  const run = await runStressTest(makeConfig({ operationType: 'mixed', duration: '150ms', randomize: true }), {
    store,
    keySource: staticKeys(['k0', 'k1', 'k2']),
  });
  assert.ok(run.stats.totalGets > 0);
  assert.ok(run.stats.totalPuts > 0);
  assert.equal(run.stats.totalBytesUp, run.stats.successfulPuts * 1024);
});

test('fixed-count write mode performs exactly one PUT per job and records each key', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'objstress-run-'));
  try {
    const manifestPath = path.join(dir, 'generated.txt');
    const store = new MemoryObjectStore();
    const run = await runStressTest(
      makeConfig({
        operationType: 'write',
        fileCount: 7,
        concurrency: 3,
        generateManifest: true,
        manifestPath,
        duration: '1ms',
      }),
      { store },
    );

    assert.equal(run.termination, 'completed');
    assert.equal(run.results.length, 7);
    assert.equal(store.puts, 7);
    assert.ok(run.results.every((result) => result.operation === 'PUT' && result.error === ''));
    assert.ok(run.results.every((result) => /^stresser\/job\d+\//.test(result.objectKey)));
    assert.equal(run.stats.totalBytesUp, 7 * 1024);

    const recorded = await loadManifest(manifestPath);
    assert.deepEqual(
      [...recorded].sort(),
      run.results.map((result) => result.objectKey).sort(),
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('continuous write mode uses per-worker keys', async () => {
  const run = await runStressTest(makeConfig({ operationType: 'write', duration: '50ms', concurrency: 2 }), {
    store: new MemoryObjectStore(),
  });
  assert.ok(run.results.length > 0);
  assert.ok(run.results.every((result) => /^stresser\/worker[01]\/\d+-[A-Za-z0-9]{8}\.dat$/.test(result.objectKey)));
});

test('setup failures are raised before any worker starts', async () => {
  const store = seededStore();
  await assert.rejects(
    () => runStressTest(makeConfig({ duration: '10 parsecs' }), { store, keySource: staticKeys(['k0']) }),
    (error: unknown) =>
      error instanceof StressSetupError && error.message.startsWith('invalid duration format "10 parsecs"'),
  );
  await assert.rejects(
    () =>
      runStressTest(makeConfig(), {
        store,
        keySource: {
          load: async () => {
            throw new Error('manifest file m.txt is empty or contains no valid keys');
          },
        },
      }),
    {
      name: 'StressSetupError',
      message:
        'failed to load manifest for read/mixed mode: manifest file m.txt is empty or contains no valid keys',
    },
  );
  await assert.rejects(
    () => runStressTest(makeConfig({ operationType: 'mixed' }), { store, keySource: staticKeys([]) }),
    {
      name: 'StressSetupError',
      message: 'failed to load manifest for read/mixed mode: no object keys available from unused-manifest.txt',
    },
  );
  assert.equal(store.gets, 0);
  assert.equal(store.puts, 0);
});

test('a crashing worker ends the run with an error and partial results', async () => {
  const run = await runStressTest(makeConfig({ operationType: 'write', putSizeKB: -1, duration: '10m' }), {
    store: new MemoryObjectStore(),
  });
  assert.equal(run.termination, 'failed');
  assert.ok(run.error instanceof RangeError);
  assert.equal(run.stats.totalRequests, run.results.length);
});

test('deadlines beyond the timer range do not fire early', async () => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), 200);
  const run = await runStressTest(makeConfig({ duration: '720h' }), {
    store: seededStore({ delayMs: 5 }),
    keySource: staticKeys(['k0', 'k1', 'k2']),
    signal: controller.signal,
  });
  clearTimeout(timer);
  assert.equal(run.termination, 'cancelled');
  assert.ok(run.results.length > 0);
  assert.ok(run.stats.durationMs >= 150);
});

test('armDeadline fires once for short durations and can be cancelled', async () => {
  let fired = 0;
  armDeadline(10, () => {
    fired += 1;
  });
  const cancel = armDeadline(10, () => {
    fired += 100;
  });
  cancel();
  await new Promise((resolve) => setTimeout(resolve, 50));
  assert.equal(fired, 1);
});

const counterValue = async (counter: typeof droppedResults): Promise<number> => {
  const metric = await counter.get();
  return metric.values.reduce((sum, entry) => sum + entry.value, 0);
};

class GatedStore implements ObjectStore {
  gets = 0;
  private gate: Promise<void>;
  private release: () => void = () => undefined;

  constructor() {
    this.gate = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release();
  }

  async get(): Promise<ObjectBody> {
    this.gets += 1;
    await this.gate;
    return (async function* () {
      yield Buffer.from('data');
    })();
  }

  async put(): Promise<void> {
    await this.gate;
  }
}

test('results that do not fit in the pipeline are dropped and counted', async () => {
  const before = await counterValue(droppedResults);
  const store = new GatedStore();
  // All workers finish their first GET in the same turn, so a one-slot pipeline overflows.
  const timer = setTimeout(() => store.open(), 20);
  const run = await runStressTest(makeConfig({ concurrency: 4, duration: '100ms' }), {
    store,
    keySource: staticKeys(['k0', 'k1', 'k2']),
    channelCapacity: 1,
  });
  clearTimeout(timer);

  const dropped = (await counterValue(droppedResults)) - before;
  assert.ok(dropped > 0);
  assert.equal(run.stats.totalRequests, run.results.length);
  assert.ok(run.results.length + dropped <= store.gets);
});

test('manifest append failures leave the PUT counted as a success', async () => {
  const before = await counterValue(manifestFailures);
  const sink: ManifestSink = {
    append: async () => {
      throw new Error('disk full');
    },
    close: async () => undefined,
  };
  const run = await runStressTest(
    makeConfig({ operationType: 'write', fileCount: 3, generateManifest: true, concurrency: 2 }),
    { store: new MemoryObjectStore(), openManifestSink: async () => sink },
  );
  assert.equal(run.termination, 'completed');
  assert.equal(run.error, undefined);
  assert.equal(run.stats.successfulPuts, 3);
  assert.equal(run.stats.totalErrors, 0);
  assert.equal((await counterValue(manifestFailures)) - before, 3);
});

test('a manifest that fails to close sets the run error but keeps results', async () => {
  const appended: string[] = [];
  const sink: ManifestSink = {
    append: async (key) => {
      appended.push(key);
    },
    close: async () => {
      throw new Error('sync failed');
    },
  };
  const run = await runStressTest(
    makeConfig({ operationType: 'write', fileCount: 2, generateManifest: true, concurrency: 1 }),
    { store: new MemoryObjectStore(), openManifestSink: async () => sink },
  );
  assert.equal(run.termination, 'completed');
  assert.equal(run.error?.message, 'sync failed');
  assert.equal(run.results.length, 2);
  assert.deepEqual(
    appended,
    run.results.map((result) => result.objectKey),
  );
});
