import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { logger } from '../logger.js';
import { runCommand, type RunOptions, type RunResult } from '../runner/commandRunner.js';
import { CollaboratorError, type VersionControl } from '../sync/collaborators.js';

export type GitOptions = {
  caBundlePath?: string;
  insecure?: boolean;
  env?: NodeJS.ProcessEnv;
  redact?: Array<string | RegExp>;
  signal?: AbortSignal;
};

/** Environment for git: CA bundle, TLS verification, and room for a credential manager prompt. */
export function buildGitEnv(options: GitOptions = {}): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...(options.env ?? process.env) };
  if (options.caBundlePath) {
    env.GIT_SSL_CAINFO = options.caBundlePath;
    env.CURL_CA_BUNDLE = options.caBundlePath;
  }
  if (options.insecure) {
    env.GIT_SSL_NO_VERIFY = '1';
  }
  delete env.GIT_TERMINAL_PROMPT;
  return env;
}

export class GitVersionControl implements VersionControl {
  private readonly env: NodeJS.ProcessEnv;
  private readonly redact: Array<string | RegExp>;
  private readonly signal: AbortSignal | undefined;

  constructor(options: GitOptions = {}) {
    this.env = buildGitEnv(options);
    this.redact = options.redact ?? [];
    this.signal = options.signal;
  }

  private git(args: string[], cwd?: string, allowFailure = false): Promise<RunResult> {
    const opts: RunOptions = { env: this.env, redact: this.redact, allowFailure };
    if (cwd) opts.cwd = cwd;
    if (this.signal) opts.signal = this.signal;
    return runCommand('git', args, opts);
  }

  private async run<T>(operation: string, target: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      throw new CollaboratorError(operation, target, err);
    }
  }

  hasWorkingCopy(dest: string): Promise<boolean> {
    return Promise.resolve(existsSync(join(dest, '.git')));
  }

  async clone(url: string, dest: string): Promise<void> {
    await this.run('git clone', dest, async () => {
      await mkdir(dirname(dest), { recursive: true });
      await this.git(['clone', url, dest]);
    });
  }

  /** Fetches origin and moves the local default branch to the upstream tip. */
  async fetchAndUpdate(dest: string): Promise<void> {
    await this.run('git fetch', dest, async () => {
      await this.git(['fetch', '--prune', 'origin'], dest);
      const branch = await this.defaultBranch(dest);
      const remoteRef = `refs/remotes/origin/${branch}`;
      const current = (await this.git(['rev-parse', '--abbrev-ref', 'HEAD'], dest)).stdout.trim();

      if (current === branch) {
        await this.git(['merge', '--ff-only', remoteRef], dest);
        return;
      }

      const localRef = `refs/heads/${branch}`;
      const localCheck = await this.git(['show-ref', '--verify', '--quiet', localRef], dest, true);
      if ((localCheck.exitCode ?? 1) === 0) {
        await this.git(['branch', '--force', branch, remoteRef], dest);
      } else {
        await this.git(['branch', branch, remoteRef], dest);
      }
      logger.debug({ dest, branch, current }, 'Updated default branch without checkout');
    });
  }

  async resolveHead(dest: string): Promise<string> {
    return this.run('git rev-parse', dest, async () => {
      const sha = (await this.git(['rev-parse', '--short', 'HEAD'], dest)).stdout.trim();
      if (!sha) throw new Error('HEAD does not resolve to a commit');
      return sha;
    });
  }

  /** The checked-out branch, or the short commit id when HEAD is detached. */
  async currentBranch(dest: string): Promise<string> {
    return this.run('git rev-parse', dest, async () => {
      const branch = (await this.git(['rev-parse', '--abbrev-ref', 'HEAD'], dest)).stdout.trim();
      if (branch && branch !== 'HEAD') return branch;
      return (await this.git(['rev-parse', '--short', 'HEAD'], dest)).stdout.trim();
    });
  }

  async defaultBranch(dest: string): Promise<string> {
    return this.run('git symbolic-ref', dest, async () => {
      const args = ['symbolic-ref', '--short', 'refs/remotes/origin/HEAD'];
      let result = await this.git(args, dest, true);
      if ((result.exitCode ?? 1) !== 0) {
        await this.git(['remote', 'set-head', 'origin', '--auto'], dest);
        result = await this.git(args, dest);
      }
      const ref = result.stdout.trim();
      const branch = ref.startsWith('origin/') ? ref.slice('origin/'.length) : ref;
      if (!branch) throw new Error('origin/HEAD does not name a branch');
      return branch;
    });
  }
}
