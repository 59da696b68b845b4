import type { Command } from 'commander';
import { REPO_LIST_KEY } from '@bbsync/core/store/codec.js';
import { deriveSlug, readRecord } from '@bbsync/core/store/records.js';
import { ensureUrlInRepoList, normalizeRepoUrl, parseRepoList } from '@bbsync/core/store/repoList.js';
import { openStore, resolveEnvFilePath, type EnvFileOptions } from '../lib/context.js';
import { formatRows, reportCommandError, writeJson } from '../lib/output.js';

type ReposOptions = EnvFileOptions & {
  json?: boolean;
};

const LIST_HEADERS = ['slug', 'status', 'lastSync', 'commit', 'branch', 'url'] as const;

export async function runReposAdd(url: string, options: ReposOptions): Promise<number> {
  const envFile = resolveEnvFilePath(options.envFile);
  try {
    const store = await openStore(envFile);
    const added = ensureUrlInRepoList(store, url);
    if (store.isDirty) {
      await store.flush();
    }
    const normalized = normalizeRepoUrl(url);
    const slug = deriveSlug(normalized);
    if (options.json) {
      writeJson({ url: normalized, slug, added });
    } else if (added) {
      process.stdout.write(`Added ${normalized} (${slug || 'no slug'}).\n`);
    } else {
      process.stdout.write(`Already listed: ${normalized}.\n`);
    }
    return 0;
  } catch (err) {
    return reportCommandError(err, envFile);
  }
}

export async function runReposList(options: ReposOptions): Promise<number> {
  const envFile = resolveEnvFilePath(options.envFile);
  try {
    const store = await openStore(envFile);
    const entries = store.entries();
    const repos = parseRepoList(store.get(REPO_LIST_KEY)).map((url) => {
      const slug = deriveSlug(url);
      return { url, slug, record: slug ? (readRecord(entries, slug) ?? null) : null };
    });

    if (options.json) {
      writeJson(repos);
      return 0;
    }
    if (!repos.length) {
      process.stdout.write('No repositories are listed in REPO_LIST.\n');
      return 0;
    }
    const rows = repos.map(({ url, slug, record }) => ({
      slug,
      status: record?.lastStatus ?? '-',
      lastSync: record?.lastSync ?? '-',
      commit: record?.lastCommit ?? '-',
      branch: record?.activeBranch ?? '-',
      url,
    }));
    process.stdout.write(`${formatRows(LIST_HEADERS, rows)}\n`);
    return 0;
  } catch (err) {
    return reportCommandError(err, envFile);
  }
}

export function registerReposCommand(program: Command) {
  const repos = program.command('repos').description('Manage the REPO_LIST allow-list');

  repos
    .command('add <url>')
    .description('Add a repository URL to REPO_LIST')
    .option('--env-file <path>', 'Path to the backing .env file')
    .option('--json', 'Print JSON output')
    .action(async (url: string, options: ReposOptions) => {
      process.exitCode = await runReposAdd(url, options);
    });

  repos
    .command('list')
    .description('List REPO_LIST entries with their last recorded sync')
    .option('--env-file <path>', 'Path to the backing .env file')
    .option('--json', 'Print JSON output')
    .action(async (options: ReposOptions) => {
      process.exitCode = await runReposList(options);
    });
}
