import { dirname } from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import { BitbucketClient, resolveBitbucketPassword } from '@bbsync/core/bitbucket/client.js';
import { applySettingDefaults, loadGlobalSettings, type GlobalSettings } from '@bbsync/core/config/settings.js';
import { GitVersionControl } from '@bbsync/core/git/vcs.js';
import { logger } from '@bbsync/core/logger.js';
import { reconcile, type RepoOutcome, type SyncSummary } from '@bbsync/core/sync/reconcile.js';
import { openStore, resolveEnvFilePath, type EnvFileOptions } from '../lib/context.js';
import { reportCommandError, writeJson } from '../lib/output.js';

export type SyncOptions = EnvFileOptions & {
  lockTimeout?: number;
  json?: boolean;
};

export function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function createHost(settings: GlobalSettings, password: string | undefined): BitbucketClient | undefined {
  if (!password) {
    if (!settings.repoList.length) {
      throw new Error(
        'REPO_LIST is empty. Set BITBUCKET_APP_PASSWORD or BITBUCKET_TOKEN to list repositories from Bitbucket.',
      );
    }
    return undefined;
  }
  return new BitbucketClient({
    auth: { username: settings.user, password },
    tls: {
      insecure: settings.insecure,
      ...(settings.bitbucketCaBundle ? { caBundlePath: settings.bitbucketCaBundle } : {}),
    },
  });
}

function describeOutcome(outcome: RepoOutcome): string {
  switch (outcome.state) {
    case 'synced':
      return `synced   ${outcome.slug} (${outcome.record.lastStatus} ${outcome.record.lastCommit} on ${outcome.record.activeBranch})`;
    case 'failed':
      return `failed   ${outcome.slug || outcome.url}: ${outcome.error.message}`;
    case 'skipped':
      return `skipped  ${outcome.slug}`;
  }
}

function summaryPayload(summary: SyncSummary) {
  return {
    synced: summary.synced.map(({ slug, url, action, record }) => ({ slug, url, action, record })),
    failed: summary.failed.map(({ slug, url, action, error }) => ({
      slug,
      url,
      ...(action ? { action } : {}),
      error: error.message,
    })),
    skipped: summary.skipped.map(({ slug, url }) => ({ slug, url })),
  };
}

export async function runSync(options: SyncOptions): Promise<number> {
  const envFile = resolveEnvFilePath(options.envFile);
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted; stopping after the current repository');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const store = await openStore(envFile, options.lockTimeout);
    if (applySettingDefaults(store)) {
      await store.flush();
    }
    const settings = loadGlobalSettings(store, { relativeTo: dirname(envFile) });
    const password = resolveBitbucketPassword();
    const host = createHost(settings, password);
    const vcs = new GitVersionControl({
      insecure: settings.insecure,
      ...(settings.gitCaBundle ? { caBundlePath: settings.gitCaBundle } : {}),
      redact: password ? [password] : [],
    });

    const summary = await reconcile({
      store,
      settings,
      vcs,
      ...(host ? { host } : {}),
      signal: controller.signal,
      ...(options.json
        ? {}
        : { onOutcome: (outcome: RepoOutcome) => process.stdout.write(`${describeOutcome(outcome)}\n`) }),
    });

    if (options.json) {
      writeJson(summaryPayload(summary));
    } else {
      process.stdout.write(
        `Synced ${summary.synced.length}, failed ${summary.failed.length}, skipped ${summary.skipped.length}.\n`,
      );
    }
    return 0;
  } catch (err) {
    return reportCommandError(err, envFile);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function registerSyncCommand(program: Command) {
  program
    .command('sync')
    .description('Clone or update every configured repository and record its state')
    .option('--env-file <path>', 'Path to the backing .env file')
    .option('--lock-timeout <ms>', 'How long to wait for the backing file lock', parsePositiveInteger)
    .option('--json', 'Print JSON output')
    .action(async (options: SyncOptions) => {
      process.exitCode = await runSync(options);
    });
}
