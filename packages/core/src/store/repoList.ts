import { REPO_LIST_KEY } from './codec.js';
import { RECORD_KEY_SUFFIXES } from './records.js';

export function normalizeRepoUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

/** Accepts one URL per line, the legacy comma-separated form, or a mix of both. */
export function parseRepoList(text: string | undefined): string[] {
  if (!text) return [];
  return text
    .split(/\r?\n/)
    .flatMap((line) => line.split(','))
    .map((item) => item.trim())
    .filter(Boolean);
}

export function formatRepoList(urls: readonly string[]): string {
  return urls.join('\n');
}

type ListStore = {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
};

/**
 * Adds a URL to the repository list unless an equivalent one is already
 * there. The list is rewritten one URL per line either way.
 */
export function ensureUrlInRepoList(store: ListStore, url: string): boolean {
  const items = parseRepoList(store.get(REPO_LIST_KEY)).map(normalizeRepoUrl);
  const normalized = normalizeRepoUrl(url);
  if (!normalized) {
    throw new Error('Repository URL cannot be empty.');
  }
  const unique = [...new Set(items)];
  const added = !unique.includes(normalized);
  if (added) unique.push(normalized);
  const next = formatRepoList(unique);
  if (next !== store.get(REPO_LIST_KEY)) {
    store.set(REPO_LIST_KEY, next);
  }
  return added;
}

const LEGACY_KEY_PATTERN = /^REPO_[A-Z0-9_]+$/;

export function isLegacyRepoKey(key: string): boolean {
  if (key === REPO_LIST_KEY || !LEGACY_KEY_PATTERN.test(key)) return false;
  return !RECORD_KEY_SUFFIXES.some((suffix) => key.endsWith(`_${suffix}`));
}

/** Removes the old per-repository `REPO_<SLUG>=<url>` keys. Returns the removed keys. */
export function migrateLegacyRepoKeys(store: {
  keys(): Iterable<string>;
  delete(key: string): unknown;
}): string[] {
  const removed = [...store.keys()].filter(isLegacyRepoKey);
  for (const key of removed) {
    store.delete(key);
  }
  return removed;
}
