import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('node:fs/promises', () => ({
  mkdir: vi.fn(),
}));

vi.mock('../runner/commandRunner.js', () => ({
  runCommand: vi.fn(),
}));

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { runCommand, type RunResult } from '../runner/commandRunner.js';
import { CollaboratorError } from '../sync/collaborators.js';
import { buildGitEnv, GitVersionControl } from './vcs.js';

function result(args: string[], stdout = '', exitCode = 0): RunResult {
  return {
    cmd: 'git',
    args,
    durationMs: 1,
    exitCode,
    signal: null,
    stdout,
    stderr: '',
    aborted: false,
  };
}

function gitCalls(): string[] {
  return vi.mocked(runCommand).mock.calls.map(([, args]) => args.join(' '));
}

function answer(outputs: Record<string, string | RunResult>) {
  vi.mocked(runCommand).mockImplementation((_cmd, args) => {
    const out = outputs[args.join(' ')];
    if (typeof out === 'object') return Promise.resolve(out);
    return Promise.resolve(result(args, out ?? ''));
  });
}

describe('buildGitEnv', () => {
  it('points git at the CA bundle and disables verification when insecure', () => {
    const env = buildGitEnv({
      env: { PATH: '/bin', GIT_TERMINAL_PROMPT: '0' },
      caBundlePath: '/certs/ca.pem',
      insecure: true,
    });

    expect(env).toEqual({
      PATH: '/bin',
      GIT_SSL_CAINFO: '/certs/ca.pem',
      CURL_CA_BUNDLE: '/certs/ca.pem',
      GIT_SSL_NO_VERIFY: '1',
    });
  });

  it('leaves verification on by default', () => {
    expect(buildGitEnv({ env: { PATH: '/bin' } })).toEqual({ PATH: '/bin' });
  });
});

describe('GitVersionControl', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('detects a working copy by its .git directory', async () => {
    vi.mocked(existsSync).mockReturnValue(true);

    await expect(new GitVersionControl().hasWorkingCopy('/base/repo1')).resolves.toBe(true);
    expect(existsSync).toHaveBeenCalledWith('/base/repo1/.git');
  });

  it('clones into the destination after creating its parent', async () => {
    answer({});
    const vcs = new GitVersionControl({ env: { PATH: '/bin' } });

    await vcs.clone('https://bitbucket.org/acme/repo1', '/base/repo1');

    expect(mkdir).toHaveBeenCalledWith('/base', { recursive: true });
    expect(runCommand).toHaveBeenCalledWith('git', ['clone', 'https://bitbucket.org/acme/repo1', '/base/repo1'], {
      env: { PATH: '/bin' },
      redact: [],
      allowFailure: false,
    });
  });

  it('fast-forwards the default branch when it is checked out', async () => {
    answer({
      'symbolic-ref --short refs/remotes/origin/HEAD': 'origin/main\n',
      'rev-parse --abbrev-ref HEAD': 'main\n',
    });

    await new GitVersionControl().fetchAndUpdate('/base/repo1');

    expect(gitCalls()).toEqual([
      'fetch --prune origin',
      'symbolic-ref --short refs/remotes/origin/HEAD',
      'rev-parse --abbrev-ref HEAD',
      'merge --ff-only refs/remotes/origin/main',
    ]);
  });

  it('moves an existing local default branch without checking it out', async () => {
    answer({
      'symbolic-ref --short refs/remotes/origin/HEAD': 'origin/main\n',
      'rev-parse --abbrev-ref HEAD': 'feature/x\n',
    });

    await new GitVersionControl().fetchAndUpdate('/base/repo1');

    expect(gitCalls().slice(3)).toEqual([
      'show-ref --verify --quiet refs/heads/main',
      'branch --force main refs/remotes/origin/main',
    ]);
  });

  it('creates the local default branch when it is missing', async () => {
    answer({
      'symbolic-ref --short refs/remotes/origin/HEAD': 'origin/main\n',
      'rev-parse --abbrev-ref HEAD': 'feature/x\n',
      'show-ref --verify --quiet refs/heads/main': result([], '', 1),
    });

    await new GitVersionControl().fetchAndUpdate('/base/repo1');

    expect(gitCalls().at(-1)).toBe('branch main refs/remotes/origin/main');
  });

  it('repairs a missing origin/HEAD before reading the default branch', async () => {
    let symbolicRefCalls = 0;
    vi.mocked(runCommand).mockImplementation((_cmd, args) => {
      if (args[0] === 'symbolic-ref') {
        symbolicRefCalls += 1;
        return Promise.resolve(
          symbolicRefCalls === 1 ? result(args, '', 128) : result(args, 'origin/develop\n'),
        );
      }
      return Promise.resolve(result(args));
    });

    await expect(new GitVersionControl().defaultBranch('/base/repo1')).resolves.toBe('develop');
    expect(gitCalls()).toContain('remote set-head origin --auto');
  });

  it('reports the short commit id when HEAD is detached', async () => {
    answer({
      'rev-parse --abbrev-ref HEAD': 'HEAD\n',
      'rev-parse --short HEAD': 'abc123\n',
    });
    const vcs = new GitVersionControl();

    await expect(vcs.currentBranch('/base/repo1')).resolves.toBe('abc123');
    await expect(vcs.resolveHead('/base/repo1')).resolves.toBe('abc123');
  });

  it('wraps git failures with the operation and destination', async () => {
    vi.mocked(runCommand).mockRejectedValue(new Error('fatal: repository not found'));

    const promise = new GitVersionControl().clone('https://bitbucket.org/acme/gone', '/base/gone');

    await expect(promise).rejects.toBeInstanceOf(CollaboratorError);
    await expect(promise).rejects.toThrow('git clone failed for /base/gone: fatal: repository not found');
  });
});
