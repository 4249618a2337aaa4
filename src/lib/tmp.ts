import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export interface RemoveOptions {
  attempts?: number; // default 3
  delayMs?: number; // default 100
}

/**
 * Remove a file or directory tree, retrying a few times on failure (files
 * still held open by a child process are the usual cause). Returns false if
 * the path could not be removed; that is logged, not thrown.
 */
export async function removeWithRetry(target: string, opts: RemoveOptions = {}): Promise<boolean> {
  const { attempts = 3, delayMs = 100 } = opts;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      fs.rmSync(target, { recursive: true, force: true });
      return true;
    } catch (e) {
      if (attempt === attempts) {
        const msg = e instanceof Error ? e.message : String(e);
        console.warn(`Could not remove temporary path ${target} after ${attempts} attempts: ${msg}`);
        return false;
      }
      await sleep(delayMs);
    }
  }
  return false;
}

/** Run `fn` with a fresh temporary directory that is removed afterwards, whether `fn` succeeds or throws. */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>, opts: RemoveOptions = {}): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await removeWithRetry(dir, opts);
  }
}
