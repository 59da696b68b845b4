import { dirname, join } from 'node:path';
import { Command } from 'commander';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ReconcileOptions, SyncSummary } from '@bbsync/core/sync/reconcile.js';
import { CLOUD_SETTINGS, readBackingFile, writeBackingFile } from '../../../core/tests/helpers/backingFile.js';
import { captureOutput } from '../../tests/helpers/output.js';

const hoisted = vi.hoisted(() => ({
  reconcile: vi.fn<(options: ReconcileOptions) => Promise<SyncSummary>>(),
}));

vi.mock('@bbsync/core/sync/reconcile.js', () => ({
  reconcile: hoisted.reconcile,
}));

import { BitbucketApiError, BitbucketClient } from '@bbsync/core/bitbucket/client.js';
import { parsePositiveInteger, registerSyncCommand, runSync } from './sync.js';

const REPO_URL = 'https://bitbucket.org/acme/repo1';

const summary: SyncSummary = {
  synced: [
    {
      state: 'synced',
      slug: 'repo1',
      url: REPO_URL,
      action: 'clone',
      record: {
        slug: 'repo1',
        defaultBranch: 'main',
        lastSync: '2024-05-01T10:00:00.000Z',
        lastStatus: 'cloned',
        lastCommit: 'abc123',
        activeBranch: 'main',
      },
    },
  ],
  failed: [
    {
      state: 'failed',
      slug: 'broken',
      url: 'https://bitbucket.org/acme/broken',
      action: 'clone',
      error: new Error('clone failed for /base/broken: repository not found'),
    },
  ],
  skipped: [],
};

function configuredFile(extra: string[] = [`REPO_LIST=${REPO_URL}`]): string {
  return writeBackingFile([...CLOUD_SETTINGS, ...extra]);
}

function firstCall(): ReconcileOptions {
  const call = hoisted.reconcile.mock.calls[0];
  if (!call) throw new Error('reconcile was not called');
  return call[0];
}

describe('sync command', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    hoisted.reconcile.mockResolvedValue(summary);
  });

  it('reconciles with the validated settings and prints JSON', async () => {
    const output = captureOutput();
    const envFile = configuredFile();

    await expect(runSync({ envFile, json: true })).resolves.toBe(0);

    const options = firstCall();
    expect(options.settings).toMatchObject({
      user: 'alice',
      target: { kind: 'cloud', workspace: 'acme' },
      baseDir: join(dirname(envFile), 'repos'),
      repoList: [REPO_URL],
    });
    expect(options).not.toHaveProperty('host');
    expect(JSON.parse(output.stdout())).toEqual({
      synced: [{ slug: 'repo1', url: REPO_URL, action: 'clone', record: summary.synced[0]?.record }],
      failed: [
        {
          slug: 'broken',
          url: 'https://bitbucket.org/acme/broken',
          action: 'clone',
          error: 'clone failed for /base/broken: repository not found',
        },
      ],
      skipped: [],
    });
  });

  it('prints each outcome and a summary line', async () => {
    const output = captureOutput();
    hoisted.reconcile.mockImplementation((options) => {
      for (const outcome of [...summary.synced, ...summary.failed]) {
        options.onOutcome?.(outcome);
      }
      return Promise.resolve(summary);
    });

    await expect(runSync({ envFile: configuredFile() })).resolves.toBe(0);

    expect(output.stdout()).toBe(
      [
        'synced   repo1 (cloned abc123 on main)',
        'failed   broken: clone failed for /base/broken: repository not found',
        'Synced 1, failed 1, skipped 0.',
        '',
      ].join('\n'),
    );
  });

  it('exits 1 and lists missing keys without syncing', async () => {
    const output = captureOutput();
    const envFile = writeBackingFile(['BITBUCKET_WORKSPACE=acme']);

    await expect(runSync({ envFile })).resolves.toBe(1);

    expect(hoisted.reconcile).not.toHaveBeenCalled();
    expect(output.stderr()).toBe(`Missing required values in ${envFile}:\n  BITBUCKET_USER=\n  BB_BASE_DIR=\n`);
    expect(readBackingFile(envFile)).toBe(
      [
        '# bbsync backing file',
        '# Fill required values. INSECURE=true by default.',
        '',
        'BITBUCKET_WORKSPACE=acme',
        'INSECURE=true',
        'REPO_LIST=',
        '',
      ].join('\n'),
    );
  });

  it('exits 1 on a malformed backing file', async () => {
    const output = captureOutput();

    await expect(runSync({ envFile: writeBackingFile(['BITBUCKET_USER=alice', 'junk']) })).resolves.toBe(1);

    expect(output.stderr()).toBe('Error: Unexpected line outside a KEY=VALUE entry: junk (line 2)\n');
  });

  it('needs credentials to list repositories when REPO_LIST is empty', async () => {
    const output = captureOutput();

    await expect(runSync({ envFile: configuredFile([]) })).resolves.toBe(1);

    expect(hoisted.reconcile).not.toHaveBeenCalled();
    expect(output.stderr()).toBe(
      'Error: REPO_LIST is empty. Set BITBUCKET_APP_PASSWORD or BITBUCKET_TOKEN to list repositories from Bitbucket.\n',
    );
  });

  it('exits 1 when listing repositories fails', async () => {
    const output = captureOutput();
    process.env.BITBUCKET_APP_PASSWORD = 'test-secret';
    hoisted.reconcile.mockRejectedValue(
      new BitbucketApiError('Bitbucket Cloud API 401: use an app password or access token with repository read access.', 401),
    );

    await expect(runSync({ envFile: configuredFile([]) })).resolves.toBe(1);

    expect(firstCall().host).toBeInstanceOf(BitbucketClient);
    expect(output.stderr()).toBe(
      'Error: Bitbucket Cloud API 401: use an app password or access token with repository read access.\n',
    );
  });

  it('wires options through commander', async () => {
    captureOutput();
    const envFile = configuredFile();
    const program = new Command();
    registerSyncCommand(program);

    await program.parseAsync(['sync', '--env-file', envFile, '--lock-timeout', '250', '--json'], { from: 'user' });

    expect(hoisted.reconcile).toHaveBeenCalledTimes(1);
    expect(firstCall().settings.repoList).toEqual([REPO_URL]);
  });

  it('rejects a lock timeout that is not a positive integer', async () => {
    const program = new Command().exitOverride().configureOutput({ writeErr: () => undefined });
    registerSyncCommand(program);

    await expect(
      program.parseAsync(['sync', '--lock-timeout', 'soon'], { from: 'user' }),
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
    expect(hoisted.reconcile).not.toHaveBeenCalled();
  });
});

describe('parsePositiveInteger', () => {
  it('parses digits and rejects zero', () => {
    expect(parsePositiveInteger('250')).toBe(250);
    expect(() => parsePositiveInteger('0')).toThrow('Expected a positive integer.');
  });
});
