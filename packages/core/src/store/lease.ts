import { randomUUID } from 'node:crypto';
import { rmSync, readFileSync } from 'node:fs';
import { link, open, readFile, rename, stat, unlink } from 'node:fs/promises';
import { hostname } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import { logger } from '../logger.js';

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
const DEFAULT_POLL_INTERVAL_MS = 100;
const DEFAULT_STALE_AFTER_MS = 5 * 60_000;

export type LeaseOptions = {
  timeoutMs?: number;
  pollIntervalMs?: number;
  staleAfterMs?: number;
  signal?: AbortSignal;
};

export type Lease = {
  readonly lockPath: string;
  readonly token: string;
  release(): Promise<void>;
};

type LockMetadata = {
  pid: number;
  host: string;
  acquiredAt: string;
  token: string;
};

export class LockTimeoutError extends Error {
  readonly lockPath: string;
  readonly timeoutMs: number;

  constructor(lockPath: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
    this.name = 'LockTimeoutError';
    this.lockPath = lockPath;
    this.timeoutMs = timeoutMs;
  }
}

export function lockPathFor(targetPath: string): string {
  return `${targetPath}.lock`;
}

function errorCode(err: unknown): string | undefined {
  return (err as NodeJS.ErrnoException | undefined)?.code;
}

function readToken(raw: string): string | undefined {
  try {
    const parsed = JSON.parse(raw) as Partial<LockMetadata>;
    return typeof parsed.token === 'string' ? parsed.token : undefined;
  } catch {
    return undefined;
  }
}

async function tryCreateLock(lockPath: string, metadata: LockMetadata): Promise<boolean> {
  try {
    const handle = await open(lockPath, 'wx');
    try {
      await handle.writeFile(JSON.stringify(metadata), 'utf8');
    } finally {
      await handle.close();
    }
    return true;
  } catch (err) {
    if (errorCode(err) === 'EEXIST') return false;
    throw err;
  }
}

/**
 * Removes the lock when it is older than `staleAfterMs`. Returns true when the
 * caller should retry at once. The file is moved aside before it is deleted,
 * so a lock another waiter created after the stat is restored, not removed.
 */
async function clearStaleLock(lockPath: string, staleAfterMs: number): Promise<boolean> {
  try {
    const stats = await stat(lockPath);
    const age = Date.now() - stats.mtimeMs;
    if (age <= staleAfterMs) return false;
    const owner = await readFile(lockPath, 'utf8');
    const aside = `${lockPath}.stale-${randomUUID()}`;
    await rename(lockPath, aside);

    if ((await readFile(aside, 'utf8')) !== owner) {
      try {
        await link(aside, lockPath);
      } catch (err) {
        if (errorCode(err) !== 'EEXIST') throw err;
        logger.warn({ lockPath }, 'Could not restore a lock replaced during stale cleanup');
      }
      await unlink(aside);
      return false;
    }

    logger.warn({ lockPath, ageMs: Math.round(age), owner }, 'Removing stale lock');
    await unlink(aside);
    return true;
  } catch (err) {
    // Released or moved by another waiter between the failed create and here.
    if (errorCode(err) === 'ENOENT') return true;
    throw err;
  }
}

/**
 * Acquires the sibling `<target>.lock` file. Only one process holds a lease
 * for a given target at a time.
 */
export async function acquireLease(targetPath: string, options: LeaseOptions = {}): Promise<Lease> {
  const {
    timeoutMs = DEFAULT_LOCK_TIMEOUT_MS,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    staleAfterMs = DEFAULT_STALE_AFTER_MS,
    signal,
  } = options;
  const lockPath = lockPathFor(targetPath);
  const metadata: LockMetadata = {
    pid: process.pid,
    host: hostname(),
    acquiredAt: new Date().toISOString(),
    token: randomUUID(),
  };
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    signal?.throwIfAborted();
    if (await tryCreateLock(lockPath, metadata)) break;
    if (await clearStaleLock(lockPath, staleAfterMs)) continue;
    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, timeoutMs);
    }
    await sleep(Math.min(pollIntervalMs, Math.max(deadline - Date.now(), 1)), undefined, {
      ...(signal ? { signal } : {}),
    });
  }

  let released = false;

  // Covers process.exit() and a second Ctrl-C while the lease is held.
  const releaseOnExit = () => {
    try {
      if (readToken(readFileSync(lockPath, 'utf8')) === metadata.token) {
        rmSync(lockPath, { force: true });
      }
    } catch {
      // already gone
    }
  };
  process.once('exit', releaseOnExit);

  logger.debug({ lockPath }, 'Lock acquired');

  return {
    lockPath,
    token: metadata.token,
    async release() {
      if (released) return;
      released = true;
      process.removeListener('exit', releaseOnExit);
      try {
        const current = await readFile(lockPath, 'utf8');
        if (readToken(current) !== metadata.token) {
          logger.warn({ lockPath }, 'Lock was taken over by another process; leaving it in place');
          return;
        }
        await unlink(lockPath);
        logger.debug({ lockPath }, 'Lock released');
      } catch (err) {
        if (errorCode(err) !== 'ENOENT') throw err;
      }
    },
  };
}

/** Runs `fn` while holding the lease and releases it on every exit path. */
export async function withLease<T>(
  targetPath: string,
  fn: (lease: Lease) => Promise<T>,
  options: LeaseOptions = {},
): Promise<T> {
  const lease = await acquireLease(targetPath, options);
  try {
    return await fn(lease);
  } finally {
    await lease.release();
  }
}
