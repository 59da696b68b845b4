import type { Command } from 'commander';
import { REPO_LIST_KEY } from '@bbsync/core/store/codec.js';
import {
  formatRepoList,
  migrateLegacyRepoKeys,
  normalizeRepoUrl,
  parseRepoList,
} from '@bbsync/core/store/repoList.js';
import type { StateRepository } from '@bbsync/core/store/stateRepository.js';
import { openStore, resolveEnvFilePath, type EnvFileOptions } from '../lib/context.js';
import { reportCommandError, writeJson } from '../lib/output.js';

type MigrateOptions = EnvFileOptions & {
  json?: boolean;
};

function rewriteRepoList(store: StateRepository): boolean {
  const current = store.get(REPO_LIST_KEY);
  if (current === undefined) return false;
  const next = formatRepoList([...new Set(parseRepoList(current).map(normalizeRepoUrl))]);
  if (next === current) return false;
  store.set(REPO_LIST_KEY, next);
  return true;
}

export async function runMigrate(options: MigrateOptions): Promise<number> {
  const envFile = resolveEnvFilePath(options.envFile);
  try {
    const store = await openStore(envFile);
    const removed = migrateLegacyRepoKeys(store);
    const repoListRewritten = rewriteRepoList(store);
    if (store.isDirty) {
      await store.flush();
    }

    if (options.json) {
      writeJson({ removed, repoListRewritten });
    } else if (!removed.length && !repoListRewritten) {
      process.stdout.write('Nothing to migrate.\n');
    } else {
      if (removed.length) {
        process.stdout.write(`Removed ${removed.length} legacy key(s): ${removed.join(', ')}\n`);
      }
      if (repoListRewritten) {
        process.stdout.write('Rewrote REPO_LIST one URL per line.\n');
      }
    }
    return 0;
  } catch (err) {
    return reportCommandError(err, envFile);
  }
}

export function registerMigrateCommand(program: Command) {
  program
    .command('migrate')
    .description('Remove legacy REPO_<NAME> keys and normalize REPO_LIST')
    .option('--env-file <path>', 'Path to the backing .env file')
    .option('--json', 'Print JSON output')
    .action(async (options: MigrateOptions) => {
      process.exitCode = await runMigrate(options);
    });
}
