import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../runner/commandRunner.js', () => ({
  runCommand: vi.fn(),
}));

import { runCommand, type RunResult } from '../runner/commandRunner.js';
import { AutoCommitError, autoCommitBackingFile, autoCommitMessage } from './autoCommit.js';

function result(args: string[], exitCode = 0): RunResult {
  return {
    cmd: 'git',
    args,
    cwd: '/work',
    durationMs: 1,
    exitCode,
    signal: null,
    stdout: '',
    stderr: '',
    aborted: false,
  };
}

function exitCodes(codes: Record<string, number>) {
  vi.mocked(runCommand).mockImplementation((_cmd, args) =>
    Promise.resolve(result(args, codes[args[0] ?? ''] ?? 0)),
  );
}

describe('autoCommitBackingFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('builds the commit message from the slug and timestamp', () => {
    expect(autoCommitMessage('repo1', '2024-05-01T10:00:00.000Z')).toBe(
      'bbsync: update REPO1 2024-05-01T10:00:00.000Z',
    );
  });

  it('commits only the backing file when it changed', async () => {
    exitCodes({ diff: 1 });

    await expect(autoCommitBackingFile('/work/.env', 'bbsync: update REPO1 now', {})).resolves.toBe(true);

    expect(runCommand).toHaveBeenLastCalledWith('git', ['commit', '-m', 'bbsync: update REPO1 now', '--', '.env'], {
      cwd: '/work',
      env: {},
    });
  });

  it('skips the commit when nothing is staged', async () => {
    exitCodes({ diff: 0 });

    await expect(autoCommitBackingFile('/work/.env', 'msg', {})).resolves.toBe(false);

    expect(vi.mocked(runCommand).mock.calls.map(([, args]) => args[0])).toEqual(['rev-parse', 'add', 'diff']);
  });

  it('fails outside a git work tree', async () => {
    exitCodes({ 'rev-parse': 128 });

    await expect(autoCommitBackingFile('/work/.env', 'msg', {})).rejects.toThrow(
      new AutoCommitError('/work is not inside a git work tree'),
    );
  });

  it('wraps a failing git command', async () => {
    vi.mocked(runCommand).mockImplementation((_cmd, args) =>
      args[0] === 'commit'
        ? Promise.reject(new Error('hook rejected'))
        : Promise.resolve(result(args, args[0] === 'diff' ? 1 : 0)),
    );

    await expect(autoCommitBackingFile('/work/.env', 'msg', {})).rejects.toMatchObject({
      name: 'AutoCommitError',
      message: 'Failed to commit .env',
    });
  });
});
