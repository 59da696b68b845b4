import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../logger.js';
import { writeFileAtomically } from './atomicWrite.js';
import {
  DEFAULT_HEADER,
  FormatError,
  parseStore,
  serializeStore,
  type CodecOptions,
  type PersistedStore,
} from './codec.js';
import { withLease, type LeaseOptions } from './lease.js';

export type StoreDelta = (store: PersistedStore) => void;

export type BackingFileOptions = CodecOptions & {
  lease?: LeaseOptions;
  header?: readonly string[];
};

function isMissingPath(err: unknown): boolean {
  const code = (err as NodeJS.ErrnoException | undefined)?.code;
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/** Reads and parses the backing file; a missing file is an empty store. */
export async function readStore(filePath: string, options: CodecOptions = {}): Promise<PersistedStore> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingPath(err)) return new Map();
    throw err;
  }
  try {
    return parseStore(raw, options);
  } catch (err) {
    if (err instanceof FormatError) {
      logger.error({ err, filePath }, 'Backing file is not a valid KEY=VALUE file');
    }
    throw err;
  }
}

/**
 * Read-modify-write of the backing file under its lease: re-read the current
 * bytes, apply `delta`, then replace the file atomically. Returns the store
 * that was written.
 */
export async function updateBackingFile(
  filePath: string,
  delta: StoreDelta,
  options: BackingFileOptions = {},
): Promise<PersistedStore> {
  const { lease, header = DEFAULT_HEADER, ...codec } = options;
  await mkdir(dirname(filePath), { recursive: true });

  return withLease(
    filePath,
    async () => {
      const current = await readStore(filePath, codec);
      delta(current);
      await writeFileAtomically(filePath, serializeStore(current, { ...codec, header }));
      return current;
    },
    lease,
  );
}
