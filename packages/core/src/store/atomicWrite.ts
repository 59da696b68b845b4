import { randomUUID } from 'node:crypto';
import { mkdir, open, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

async function fsyncDirectory(dirPath: string): Promise<void> {
  let dirHandle: FileHandle | undefined;
  try {
    dirHandle = await open(dirPath, 'r');
    await dirHandle.sync();
  } catch {
    // Not supported on every platform (Windows).
    return;
  } finally {
    if (dirHandle) {
      await dirHandle.close();
    }
  }
}

async function existingMode(targetPath: string): Promise<number | undefined> {
  try {
    return (await stat(targetPath)).mode & 0o777;
  } catch {
    return undefined;
  }
}

export function tempPathFor(targetPath: string): string {
  return join(dirname(targetPath), `.${basename(targetPath)}.tmp-${process.pid}-${randomUUID()}`);
}

/**
 * Writes `data` to a temp file beside `targetPath` and renames it over the
 * target. Readers see either the previous content or the new one. The
 * target's permission bits are kept unless `mode` is given.
 */
export async function writeFileAtomically(
  targetPath: string,
  data: string,
  options: { mode?: number } = {},
): Promise<void> {
  const dirPath = dirname(targetPath);
  const tempPath = tempPathFor(targetPath);

  await mkdir(dirPath, { recursive: true });
  const mode = options.mode ?? (await existingMode(targetPath)) ?? 0o600;

  let fileHandle: FileHandle | undefined;
  try {
    fileHandle = await open(tempPath, 'wx', mode);
    await fileHandle.writeFile(data, 'utf8');
    await fileHandle.sync();
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close();
      fileHandle = undefined;
    }
    await rm(tempPath, { force: true });
    throw error;
  } finally {
    if (fileHandle) {
      await fileHandle.close();
    }
  }

  try {
    await rename(tempPath, targetPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }

  await fsyncDirectory(dirPath);
}
