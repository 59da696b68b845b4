import { resolve } from 'node:path';
import { expandHomePath, resolvePositiveInteger, resolveStringValue } from '@bbsync/core/config/resolve.js';
import { DEFAULT_LOCK_TIMEOUT_MS } from '@bbsync/core/store/lease.js';
import { StateRepository } from '@bbsync/core/store/stateRepository.js';

export type EnvFileOptions = {
  envFile?: string;
};

/** `--env-file`, then `BBSYNC_ENV_FILE`, then `.env` in the working directory. */
export function resolveEnvFilePath(explicit?: string, cwd = process.cwd()): string {
  const chosen = explicit?.trim() || resolveStringValue('BBSYNC_ENV_FILE', { defaultValue: '.env' }) || '.env';
  return resolve(cwd, expandHomePath(chosen));
}

export function resolveLockTimeout(explicit?: number): number {
  return explicit ?? resolvePositiveInteger('BBSYNC_LOCK_TIMEOUT_MS', DEFAULT_LOCK_TIMEOUT_MS);
}

export function openStore(envFile: string, lockTimeoutMs?: number): Promise<StateRepository> {
  return StateRepository.load(envFile, { lease: { timeoutMs: resolveLockTimeout(lockTimeoutMs) } });
}
