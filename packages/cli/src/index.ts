#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerMigrateCommand } from './commands/migrate.js';
import { registerReposCommand } from './commands/repos.js';
import { registerSyncCommand } from './commands/sync.js';

function resolveVersion(): string {
  try {
    const distDir = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(distDir, '..', 'package.json');
    const raw = readFileSync(pkgPath, 'utf8');
    const parsed = JSON.parse(raw) as { version?: string };
    return parsed.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program.name('bbsync').description('Keep local clones of Bitbucket repositories in sync').version(resolveVersion());

registerSyncCommand(program);
registerCheckCommand(program);
registerReposCommand(program);
registerMigrateCommand(program);

await program.parseAsync(process.argv);
