import { readStore, updateBackingFile, type BackingFileOptions, type StoreDelta } from './backingFile.js';
import type { CodecOptions, PersistedStore } from './codec.js';

export class MissingFieldsError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required values: ${missing.join(', ')}`);
    this.name = 'MissingFieldsError';
    this.missing = missing;
  }
}

// `null` marks a key deleted in this session.
type PendingEdits = Map<string, string | null>;

function codecOptions(options: BackingFileOptions): CodecOptions {
  return options.listKeys ? { listKeys: options.listKeys } : {};
}

function hasAllKeys<K extends string>(
  values: Partial<Record<K, string>>,
  keys: readonly K[],
): values is Record<K, string> {
  return keys.every((key) => values[key] !== undefined);
}

function overlay(base: PersistedStore, edits: PendingEdits): void {
  for (const [key, value] of edits) {
    if (value === null) base.delete(key);
    else base.set(key, value);
  }
}

/**
 * In-memory view of the backing file. Edits made through `set`/`delete` are
 * tracked until `flush`, so that reloads and writes only ever override the
 * keys this session actually touched.
 */
export class StateRepository {
  readonly filePath: string;
  private readonly options: BackingFileOptions;
  private current: PersistedStore;
  private readonly pending: PendingEdits = new Map();

  constructor(filePath: string, entries: PersistedStore = new Map(), options: BackingFileOptions = {}) {
    this.filePath = filePath;
    this.options = options;
    this.current = new Map(entries);
  }

  static async load(filePath: string, options: BackingFileOptions = {}): Promise<StateRepository> {
    const entries = await readStore(filePath, codecOptions(options));
    return new StateRepository(filePath, entries, options);
  }

  get(key: string): string | undefined {
    return this.current.get(key);
  }

  has(key: string): boolean {
    return this.current.has(key);
  }

  keys(): string[] {
    return [...this.current.keys()];
  }

  entries(): ReadonlyMap<string, string> {
    return new Map(this.current);
  }

  set(key: string, value: string): void {
    this.current.set(key, value);
    this.pending.set(key, value);
  }

  delete(key: string): boolean {
    const existed = this.current.delete(key);
    this.pending.set(key, null);
    return existed;
  }

  get isDirty(): boolean {
    return this.pending.size > 0;
  }

  touchedKeys(): string[] {
    return [...this.pending.keys()];
  }

  /** Returns every requested value, or fails listing all keys that are absent or blank. */
  require<K extends string>(keys: readonly K[]): Record<K, string> {
    const missing: string[] = [];
    const values: Partial<Record<K, string>> = {};
    for (const key of keys) {
      const value = this.current.get(key)?.trim();
      if (!value) {
        if (!missing.includes(key)) missing.push(key);
        continue;
      }
      values[key] = value;
    }
    if (missing.length || !hasAllKeys(values, keys)) {
      throw new MissingFieldsError(missing);
    }
    return values;
  }

  /** Reloads the file, keeping only this session's unflushed edits on top. */
  async mergeFromDisk(): Promise<void> {
    const disk = await readStore(this.filePath, codecOptions(this.options));
    overlay(disk, this.pending);
    this.current = disk;
  }

  /** Writes this session's edits through the locked read-modify-write cycle. */
  async flush(): Promise<void> {
    const edits: PendingEdits = new Map(this.pending);
    const written = await updateBackingFile(this.filePath, (store) => overlay(store, edits), this.options);
    for (const [key, value] of edits) {
      if (this.pending.get(key) === value) this.pending.delete(key);
    }
    overlay(written, this.pending);
    this.current = written;
  }

  /**
   * Applies `delta` to a fresh read of the file under the lease and writes it.
   * Unflushed local edits are neither written nor lost.
   */
  async commit(delta: StoreDelta): Promise<void> {
    const written = await updateBackingFile(this.filePath, delta, this.options);
    const view = new Map(written);
    overlay(view, this.pending);
    this.current = view;
  }
}
