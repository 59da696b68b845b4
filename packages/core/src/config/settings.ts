import { isAbsolute, resolve } from 'node:path';
import { REPO_LIST_KEY } from '../store/codec.js';
import { parseRepoList } from '../store/repoList.js';
import type { StateRepository } from '../store/stateRepository.js';
import { expandHomePath, InvalidSettingError, parseBooleanValue, resolveOptionalFlag } from './resolve.js';

export const SETTING_KEYS = {
  user: 'BITBUCKET_USER',
  workspace: 'BITBUCKET_WORKSPACE',
  baseUrl: 'BITBUCKET_BASE_URL',
  project: 'BITBUCKET_PROJECT',
  baseDir: 'BB_BASE_DIR',
  repoList: REPO_LIST_KEY,
  insecure: 'INSECURE',
  bitbucketCaBundle: 'BITBUCKET_CA_BUNDLE',
  gitCaBundle: 'GIT_CA_BUNDLE',
  autoCommit: 'AUTO_COMMIT_ENV',
} as const;

const CLOUD_REQUIRED = [SETTING_KEYS.user, SETTING_KEYS.workspace, SETTING_KEYS.baseDir] as const;
const SERVER_REQUIRED = [
  SETTING_KEYS.user,
  SETTING_KEYS.baseUrl,
  SETTING_KEYS.project,
  SETTING_KEYS.baseDir,
] as const;

export type SyncTarget =
  | { kind: 'cloud'; workspace: string; project?: string }
  | { kind: 'server'; baseUrl: string; project: string };

export type GlobalSettings = {
  readonly user: string;
  readonly target: SyncTarget;
  readonly baseDir: string;
  readonly insecure: boolean;
  readonly bitbucketCaBundle?: string;
  readonly gitCaBundle?: string;
  readonly repoList: readonly string[];
  readonly autoCommit: boolean;
};

const CLOUD_HOSTS = new Set(['bitbucket.org', 'www.bitbucket.org', 'api.bitbucket.org']);

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Resolves where repositories are listed from. `BITBUCKET_WORKSPACE` may be a
 * plain workspace slug or a full URL to a project page.
 */
export function detectTarget(workspaceOrUrl: string, baseUrl?: string, project?: string): SyncTarget {
  const workspace = workspaceOrUrl.trim();
  if (/^https?:\/\//i.test(workspace)) {
    let url: URL;
    try {
      url = new URL(workspace);
    } catch {
      throw new InvalidSettingError(SETTING_KEYS.workspace, `Invalid BITBUCKET_WORKSPACE URL: ${workspace}`);
    }
    const projectKey = /\/projects\/([^/]+)\/?/i.exec(url.pathname)?.[1];
    if (CLOUD_HOSTS.has(url.hostname.toLowerCase())) {
      const cloudWorkspace = url.pathname.split('/').filter(Boolean)[0];
      if (!cloudWorkspace) {
        throw new InvalidSettingError(
          SETTING_KEYS.workspace,
          `BITBUCKET_WORKSPACE URL does not name a workspace: ${workspace}`,
        );
      }
      return {
        kind: 'cloud',
        workspace: decodeURIComponent(cloudWorkspace),
        ...(projectKey ? { project: decodeURIComponent(projectKey) } : {}),
      };
    }
    if (!projectKey) {
      throw new InvalidSettingError(
        SETTING_KEYS.workspace,
        `BITBUCKET_WORKSPACE looks like a URL but is not /projects/<KEY>: ${workspace}`,
      );
    }
    return { kind: 'server', baseUrl: url.origin, project: decodeURIComponent(projectKey) };
  }
  if (workspace) {
    return { kind: 'cloud', workspace };
  }
  if (baseUrl?.trim() && project?.trim()) {
    return { kind: 'server', baseUrl: trimTrailingSlash(baseUrl.trim()), project: project.trim() };
  }
  throw new InvalidSettingError(
    SETTING_KEYS.workspace,
    'Incomplete destination: set BITBUCKET_WORKSPACE, or BITBUCKET_BASE_URL and BITBUCKET_PROJECT.',
  );
}

/** Keys that must be present for the mode the file is configured for. */
export function requiredSettingKeys(store: Pick<StateRepository, 'get'>): readonly string[] {
  const hasWorkspace = Boolean(store.get(SETTING_KEYS.workspace)?.trim());
  const wantsServer =
    Boolean(store.get(SETTING_KEYS.baseUrl)?.trim()) || Boolean(store.get(SETTING_KEYS.project)?.trim());
  return !hasWorkspace && wantsServer ? SERVER_REQUIRED : CLOUD_REQUIRED;
}

// No environment fallback: TLS verification is controlled by the backing file alone.
function fileFlag(store: Pick<StateRepository, 'get'>, key: string, defaultValue: boolean): boolean {
  const raw = store.get(key);
  return raw !== undefined && raw.trim() !== '' ? parseBooleanValue(raw, key) : defaultValue;
}

function optional(store: Pick<StateRepository, 'get'>, key: string): string | undefined {
  const value = store.get(key)?.trim();
  return value ? value : undefined;
}

function resolveFilePath(value: string, relativeTo: string): string {
  const expanded = expandHomePath(value);
  return isAbsolute(expanded) ? expanded : resolve(relativeTo, expanded);
}

/**
 * Validates and freezes the global settings. Fails with MissingFieldsError
 * naming every absent required key, or InvalidSettingError for a bad value.
 */
export function loadGlobalSettings(
  store: Pick<StateRepository, 'get' | 'require'>,
  options: { relativeTo?: string } = {},
): GlobalSettings {
  const relativeTo = options.relativeTo ?? process.cwd();
  const required = store.require(requiredSettingKeys(store));
  const user = required[SETTING_KEYS.user] ?? '';
  const baseDir = required[SETTING_KEYS.baseDir] ?? '';
  const target = detectTarget(
    store.get(SETTING_KEYS.workspace) ?? '',
    store.get(SETTING_KEYS.baseUrl),
    store.get(SETTING_KEYS.project),
  );

  const bitbucketCaBundle = optional(store, SETTING_KEYS.bitbucketCaBundle);
  const gitCaBundle = optional(store, SETTING_KEYS.gitCaBundle);

  return Object.freeze({
    user,
    target,
    baseDir: resolveFilePath(baseDir, relativeTo),
    insecure: fileFlag(store, SETTING_KEYS.insecure, true),
    ...(bitbucketCaBundle ? { bitbucketCaBundle: resolveFilePath(bitbucketCaBundle, relativeTo) } : {}),
    ...(gitCaBundle ? { gitCaBundle: resolveFilePath(gitCaBundle, relativeTo) } : {}),
    repoList: Object.freeze(parseRepoList(store.get(SETTING_KEYS.repoList))),
    autoCommit: resolveOptionalFlag(SETTING_KEYS.autoCommit, store.get(SETTING_KEYS.autoCommit), false),
  });
}

/** Adds `INSECURE=true` and an empty `REPO_LIST` when absent. Returns whether anything changed. */
export function applySettingDefaults(store: Pick<StateRepository, 'has' | 'set'>): boolean {
  let changed = false;
  if (!store.has(SETTING_KEYS.insecure)) {
    store.set(SETTING_KEYS.insecure, 'true');
    changed = true;
  }
  if (!store.has(SETTING_KEYS.repoList)) {
    store.set(SETTING_KEYS.repoList, '');
    changed = true;
  }
  return changed;
}
