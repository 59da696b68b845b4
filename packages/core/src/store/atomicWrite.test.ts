import { readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { rename } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { makeTempDir } from '../../tests/helpers/backingFile.js';
import { tempPathFor, writeFileAtomically } from './atomicWrite.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

describe('writeFileAtomically', () => {
  it('replaces the target content', async () => {
    const filePath = join(makeTempDir(), '.env');
    writeFileSync(filePath, 'A=1\n', 'utf8');

    await writeFileAtomically(filePath, 'A=2\n');

    expect(readFileSync(filePath, 'utf8')).toBe('A=2\n');
    expect(readdirSync(join(filePath, '..'))).toEqual(['.env']);
  });

  it('creates new files readable by the owner only', async () => {
    const filePath = join(makeTempDir(), 'sub', '.env');

    await writeFileAtomically(filePath, 'A=1\n');

    expect(statSync(filePath).mode & 0o777).toBe(0o600);
  });

  it('keeps the original and removes the temp file when the rename fails', async () => {
    const filePath = join(makeTempDir(), '.env');
    writeFileSync(filePath, 'A=1\n', 'utf8');
    vi.mocked(rename).mockRejectedValueOnce(new Error('rename failed'));

    await expect(writeFileAtomically(filePath, 'A=2\n')).rejects.toThrow('rename failed');

    expect(readFileSync(filePath, 'utf8')).toBe('A=1\n');
    expect(readdirSync(join(filePath, '..'))).toEqual(['.env']);
  });
});

describe('tempPathFor', () => {
  it('places the temp file beside the target', () => {
    expect(tempPathFor('/data/.env')).toMatch(/^\/data\/\.\.env\.tmp-\d+-[0-9a-f-]{36}$/);
  });
});
