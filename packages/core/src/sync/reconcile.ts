import { join } from 'node:path';
import type { GlobalSettings } from '../config/settings.js';
import { autoCommitBackingFile, autoCommitMessage } from '../git/autoCommit.js';
import { logger } from '../logger.js';
import type { PersistedStore } from '../store/codec.js';
import { deriveSlug, recordKey, writeRecord, type RepositoryRecord, type SyncStatus } from '../store/records.js';
import { normalizeRepoUrl } from '../store/repoList.js';
import type { StateRepository } from '../store/stateRepository.js';
import { CollaboratorError, type RepositoryHost, type VersionControl } from './collaborators.js';

export type SyncAction = 'clone' | 'update';

export type SyncedOutcome = {
  state: 'synced';
  slug: string;
  url: string;
  action: SyncAction;
  record: RepositoryRecord;
};

export type FailedOutcome = {
  state: 'failed';
  slug: string;
  url: string;
  action?: SyncAction;
  error: Error;
};

export type SkippedOutcome = {
  state: 'skipped';
  slug: string;
  url: string;
};

export type RepoOutcome = SyncedOutcome | FailedOutcome | SkippedOutcome;

export type SyncSummary = {
  synced: SyncedOutcome[];
  failed: FailedOutcome[];
  skipped: SkippedOutcome[];
};

export type Candidate = {
  url: string;
  slug: string;
};

export type AutoCommit = (filePath: string, message: string) => Promise<boolean>;

export type ReconcileOptions = {
  store: StateRepository;
  settings: GlobalSettings;
  vcs: VersionControl;
  host?: RepositoryHost;
  now?: () => Date;
  autoCommit?: AutoCommit;
  signal?: AbortSignal;
  onOutcome?: (outcome: RepoOutcome) => void;
};

type Observed = Omit<RepositoryRecord, 'lastSync'> & { observedAt: Date };

const STATUS_FOR_ACTION: Record<SyncAction, SyncStatus> = {
  clone: 'cloned',
  update: 'updated',
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * The allow-list when it has entries, otherwise every repository the host
 * lists for the configured workspace or project.
 */
export async function resolveCandidates(
  settings: GlobalSettings,
  host?: RepositoryHost,
): Promise<Candidate[]> {
  if (settings.repoList.length) {
    return settings.repoList.map((url) => ({ url: normalizeRepoUrl(url), slug: deriveSlug(url) }));
  }
  if (!host) {
    throw new Error('REPO_LIST is empty and no repository host is configured to list repositories.');
  }
  const remote = await host.listRepositories(settings.target);
  return remote.map((repo) => ({ url: normalizeRepoUrl(repo.url), slug: deriveSlug(repo.url) }));
}

/** Keeps `lastSync` strictly increasing for a slug even when the clock has not moved. */
export function nextSyncTimestamp(observedAt: Date, previous: string | undefined): string {
  let millis = observedAt.getTime();
  const previousMillis = previous ? Date.parse(previous) : Number.NaN;
  if (!Number.isNaN(previousMillis) && millis <= previousMillis) {
    millis = previousMillis + 1;
  }
  return new Date(millis).toISOString();
}

/** Labels a failure with the collaborator call that raised it. */
async function step<T>(operation: string, dest: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof CollaboratorError) throw err;
    throw new CollaboratorError(operation, dest, err);
  }
}

async function observe(
  vcs: VersionControl,
  candidate: Candidate,
  dest: string,
  action: SyncAction,
  now: () => Date,
): Promise<Observed> {
  if (action === 'clone') {
    await step('clone', dest, () => vcs.clone(candidate.url, dest));
  } else {
    await step('update', dest, () => vcs.fetchAndUpdate(dest));
  }
  const defaultBranch = await step('default branch lookup', dest, () => vcs.defaultBranch(dest));
  const lastCommit = await step('HEAD lookup', dest, () => vcs.resolveHead(dest));
  const activeBranch = await step('branch lookup', dest, () => vcs.currentBranch(dest));
  return {
    slug: candidate.slug,
    defaultBranch,
    lastStatus: STATUS_FOR_ACTION[action],
    lastCommit,
    activeBranch,
    observedAt: now(),
  };
}

async function syncOne(
  candidate: Candidate,
  options: ReconcileOptions,
  now: () => Date,
): Promise<SyncedOutcome | FailedOutcome> {
  const { store, settings, vcs } = options;
  const dest = join(settings.baseDir, candidate.slug);
  const log = logger.child({ slug: candidate.slug });

  let action: SyncAction | undefined;
  let observed: Observed;
  try {
    action = (await step('inspect', dest, () => vcs.hasWorkingCopy(dest))) ? 'update' : 'clone';
    log.info({ action, dest }, action === 'clone' ? 'Cloning repository' : 'Updating repository');
    observed = await observe(vcs, candidate, dest, action, now);
  } catch (err) {
    const error = toError(err);
    log.error({ err: error, action }, 'Repository sync failed');
    return {
      state: 'failed',
      slug: candidate.slug,
      url: candidate.url,
      ...(action ? { action } : {}),
      error,
    };
  }

  const { observedAt, ...fields } = observed;
  const written: { record?: RepositoryRecord } = {};
  try {
    await store.commit((persisted: PersistedStore) => {
      const next: RepositoryRecord = {
        ...fields,
        lastSync: nextSyncTimestamp(observedAt, persisted.get(recordKey(candidate.slug, 'lastSync'))),
      };
      writeRecord(persisted, next);
      written.record = next;
    });
  } catch (err) {
    const error = toError(err);
    log.error({ err: error, action }, 'Failed to persist repository metadata');
    return { state: 'failed', slug: candidate.slug, url: candidate.url, action, error };
  }
  const { record } = written;
  if (!record) {
    return {
      state: 'failed',
      slug: candidate.slug,
      url: candidate.url,
      action,
      error: new Error('Metadata delta was not applied'),
    };
  }

  log.info({ action, commit: record.lastCommit, branch: record.activeBranch }, 'Repository synced');

  if (settings.autoCommit) {
    const autoCommit = options.autoCommit ?? autoCommitBackingFile;
    try {
      await autoCommit(store.filePath, autoCommitMessage(candidate.slug, record.lastSync));
    } catch (err) {
      log.warn({ err, filePath: store.filePath }, 'Auto-commit of backing file failed');
    }
  }

  return { state: 'synced', slug: candidate.slug, url: candidate.url, action, record };
}

/**
 * Syncs every candidate repository in order. A failing repository is
 * recorded and never stops the batch; only successful syncs write metadata.
 */
export async function reconcile(options: ReconcileOptions): Promise<SyncSummary> {
  const now = options.now ?? (() => new Date());
  const summary: SyncSummary = { synced: [], failed: [], skipped: [] };
  const record = (outcome: RepoOutcome) => {
    if (outcome.state === 'synced') summary.synced.push(outcome);
    else if (outcome.state === 'failed') summary.failed.push(outcome);
    else summary.skipped.push(outcome);
    options.onOutcome?.(outcome);
  };

  const candidates = await resolveCandidates(options.settings, options.host);
  const seen = new Set<string>();

  for (const candidate of candidates) {
    if (options.signal?.aborted) {
      record({ state: 'skipped', slug: candidate.slug, url: candidate.url });
      continue;
    }
    if (!candidate.slug) {
      record({
        state: 'failed',
        slug: candidate.slug,
        url: candidate.url,
        error: new Error(`Cannot derive a repository slug from ${candidate.url}`),
      });
      continue;
    }
    if (seen.has(candidate.slug)) {
      record({
        state: 'failed',
        slug: candidate.slug,
        url: candidate.url,
        error: new Error(`Slug ${candidate.slug} is already used by another repository in this run`),
      });
      continue;
    }
    seen.add(candidate.slug);
    record(await syncOne(candidate, options, now));
  }

  logger.info(
    {
      synced: summary.synced.length,
      failed: summary.failed.length,
      skipped: summary.skipped.length,
    },
    'Sync finished',
  );
  return summary;
}
