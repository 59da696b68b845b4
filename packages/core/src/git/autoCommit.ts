import { basename, dirname } from 'node:path';
import { runCommand } from '../runner/commandRunner.js';

export class AutoCommitError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AutoCommitError';
  }
}

export function autoCommitMessage(slug: string, timestamp: string): string {
  return `bbsync: update ${slug.toUpperCase()} ${timestamp}`;
}

/**
 * Stages the backing file and commits it in the git work tree that contains
 * it. Returns false when the file had no changes to commit.
 */
export async function autoCommitBackingFile(
  filePath: string,
  message: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<boolean> {
  const cwd = dirname(filePath);
  const name = basename(filePath);
  const common = { cwd, env } as const;

  const toplevel = await runCommand('git', ['rev-parse', '--show-toplevel'], {
    ...common,
    allowFailure: true,
  });
  if ((toplevel.exitCode ?? 1) !== 0) {
    throw new AutoCommitError(`${cwd} is not inside a git work tree`);
  }

  try {
    await runCommand('git', ['add', '--', name], common);
    const staged = await runCommand('git', ['diff', '--cached', '--quiet', '--', name], {
      ...common,
      allowFailure: true,
    });
    if (staged.exitCode === 0) return false;
    await runCommand('git', ['commit', '-m', message, '--', name], common);
    return true;
  } catch (err) {
    throw new AutoCommitError(`Failed to commit ${name}`, err);
  }
}
