import { open, readFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { KeySource, ManifestSink } from './types';

export class ManifestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ManifestError';
  }
}

/** One key per line; surrounding whitespace is trimmed and blank lines are skipped. */
export const parseManifest = (raw: string): string[] => {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
};

export const loadManifest = async (filePath: string): Promise<string[]> => {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ManifestError(`failed to read manifest file ${filePath}`, { cause: error });
  }
  const keys = parseManifest(raw);
  if (keys.length === 0) {
    throw new ManifestError(`manifest file ${filePath} is empty or contains no valid keys`);
  }
  return keys;
};

export class FileKeySource implements KeySource {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(): Promise<string[]> {
    return loadManifest(this.filePath);
  }
}

/**
 * Truncates `filePath` and appends keys in completion order. Concurrent appends
 * are chained so that each line is written whole before the next one starts.
 */
export class ManifestWriter implements ManifestSink {
  private handle: FileHandle;
  private filePath: string;
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private count = 0;

  private constructor(filePath: string, handle: FileHandle) {
    this.filePath = filePath;
    this.handle = handle;
  }

  static async create(filePath: string): Promise<ManifestWriter> {
    try {
      const handle = await open(filePath, 'w', 0o644);
      return new ManifestWriter(filePath, handle);
    } catch (error) {
      throw new ManifestError(`failed to create manifest file ${filePath}`, { cause: error });
    }
  }

  get path(): string {
    return this.filePath;
  }

  get written(): number {
    return this.count;
  }

  append(key: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ManifestError('manifest writer is closed'));
    }
    const next = this.tail.then(async () => {
      await this.handle.write(`${key}\n`);
      this.count += 1;
    });
    // A failed line is reported to its caller; later appends still proceed.
    this.tail = next.catch(() => undefined);
    return next.catch((error: unknown) => {
      throw new ManifestError(`failed to write key to manifest ${this.filePath}`, { cause: error });
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.tail;
    try {
      await this.handle.sync();
    } finally {
      await this.handle.close();
    }
  }
}

export type { KeySource, ManifestSink } from './types';
