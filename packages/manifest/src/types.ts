/** Ordered source of object keys for read workloads. */
export interface KeySource {
  load(): Promise<string[]>;
}

/** Append-only record of keys created by a write workload. */
export interface ManifestSink {
  append(key: string): Promise<void>;
  /** Flushes and closes; entries appended before a successful close are durable. */
  close(): Promise<void>;
}
