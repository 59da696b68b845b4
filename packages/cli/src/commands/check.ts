import { dirname } from 'node:path';
import type { Command } from 'commander';
import { applySettingDefaults, loadGlobalSettings } from '@bbsync/core/config/settings.js';
import { openStore, resolveEnvFilePath, type EnvFileOptions } from '../lib/context.js';
import { reportCommandError } from '../lib/output.js';

export async function runCheck(options: EnvFileOptions): Promise<number> {
  const envFile = resolveEnvFilePath(options.envFile);
  try {
    const store = await openStore(envFile);
    if (applySettingDefaults(store)) {
      await store.flush();
    }
    loadGlobalSettings(store, { relativeTo: dirname(envFile) });
    process.stdout.write('Environment OK.\n');
    return 0;
  } catch (err) {
    return reportCommandError(err, envFile);
  }
}

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .description('Fill defaults in the backing file and validate the required settings')
    .option('--env-file <path>', 'Path to the backing .env file')
    .action(async (options: EnvFileOptions) => {
      process.exitCode = await runCheck(options);
    });
}
