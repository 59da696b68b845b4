import type { PersistedStore } from './codec.js';

export type SyncStatus = 'cloned' | 'updated';

export type RepositoryRecord = {
  slug: string;
  defaultBranch: string;
  lastSync: string;
  lastStatus: SyncStatus;
  lastCommit: string;
  activeBranch: string;
};

type RecordField = Exclude<keyof RepositoryRecord, 'slug'>;

const FIELD_SUFFIXES: Record<RecordField, string> = {
  defaultBranch: 'DEFAULT_BRANCH',
  lastSync: 'LAST_SYNC',
  lastStatus: 'LAST_STATUS',
  lastCommit: 'LAST_COMMIT',
  activeBranch: 'ACTIVE_BRANCH',
};

export const RECORD_KEY_SUFFIXES: readonly string[] = Object.values(FIELD_SUFFIXES);

/**
 * Derives the slug of a repository from its clone or browse URL: the last
 * path segment without `.git`, lowercased, with non-alphanumeric runs
 * collapsed to `_`. Returns an empty string when nothing usable remains.
 */
export function deriveSlug(url: string): string {
  const withoutQuery = url.trim().replace(/[?#].*$/, '');
  // scp-like git URLs (git@host:ws/repo.git) have no scheme
  const path = withoutQuery.includes('://')
    ? withoutQuery.slice(withoutQuery.indexOf('://') + 3).replace(/^[^/]*/, '')
    : withoutQuery.replace(/^[^:/]*:/, '');
  const segments = path.split('/').filter(Boolean);
  const last = segments[segments.length - 1] ?? '';
  return last
    .replace(/\.git$/i, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

function keySegment(slug: string): string {
  return slug.toUpperCase();
}

export function recordKey(slug: string, field: RecordField): string {
  return `REPO_${keySegment(slug)}_${FIELD_SUFFIXES[field]}`;
}

export function recordKeys(slug: string): string[] {
  return RECORD_KEY_SUFFIXES.map((suffix) => `REPO_${keySegment(slug)}_${suffix}`);
}

function isSyncStatus(value: string | undefined): value is SyncStatus {
  return value === 'cloned' || value === 'updated';
}

/** Reads the typed view for one slug; undefined unless all five keys are present and valid. */
export function readRecord(
  store: ReadonlyMap<string, string>,
  slug: string,
): RepositoryRecord | undefined {
  const lastStatus = store.get(recordKey(slug, 'lastStatus'));
  const lastSync = store.get(recordKey(slug, 'lastSync'));
  const defaultBranch = store.get(recordKey(slug, 'defaultBranch'));
  const lastCommit = store.get(recordKey(slug, 'lastCommit'));
  const activeBranch = store.get(recordKey(slug, 'activeBranch'));
  if (
    !isSyncStatus(lastStatus) ||
    lastSync === undefined ||
    defaultBranch === undefined ||
    lastCommit === undefined ||
    activeBranch === undefined
  ) {
    return undefined;
  }
  return { slug, defaultBranch, lastSync, lastStatus, lastCommit, activeBranch };
}

/** Writes all five keys of a record into the store in a fixed order. */
export function writeRecord(store: PersistedStore, record: RepositoryRecord): void {
  store.set(recordKey(record.slug, 'defaultBranch'), record.defaultBranch);
  store.set(recordKey(record.slug, 'lastSync'), record.lastSync);
  store.set(recordKey(record.slug, 'lastStatus'), record.lastStatus);
  store.set(recordKey(record.slug, 'lastCommit'), record.lastCommit);
  store.set(recordKey(record.slug, 'activeBranch'), record.activeBranch);
}
