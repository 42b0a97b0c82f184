import fg from 'fast-glob';
import { access, mkdir, mkdtemp, rename, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { MODES, type Mode } from './types.js';

/** Directory under the cache dir holding one partition per mode */
export const RUN_DIR = 'run';

export function partitionRoot(cacheDir: string): string {
  return join(cacheDir, RUN_DIR);
}

export function partitionDir(cacheDir: string, mode: Mode): string {
  return join(cacheDir, RUN_DIR, mode);
}

/** Delete the partitions of every mode other than `mode` */
export async function deleteOtherPartitions(cacheDir: string, mode: Mode): Promise<void> {
  await Promise.all(
    MODES.filter((m) => m !== mode).map((m) => rm(partitionDir(cacheDir, m), { recursive: true, force: true })),
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

type Staged = readonly [original: string, temp: string];

async function restoreStaged(staged: Staged[]): Promise<void> {
  while (staged.length > 0) {
    const [original, temp] = staged[staged.length - 1];
    await mkdir(dirname(original), { recursive: true });
    await rename(temp, original);
    staged.pop();
  }
}

/**
 * Delete every path in `clean` while keeping the files under `preserve`.
 *
 * Preserved files are moved into a staging directory created under
 * `stagingParent` (same file system, so moves are renames), the clean runs,
 * the preserved directory tree is recreated and the files are moved back.
 * Each step completes before the next starts. Staged files are moved back on
 * every exit path; if that fails the staging directory is left in place.
 */
export async function cleanButPreserve(
  clean: readonly string[],
  preserve: readonly string[],
  stagingParent: string,
): Promise<void> {
  const roots: string[] = [];
  for (const dir of preserve) {
    if (await exists(dir)) roots.push(dir);
  }

  const scan = (onlyDirectories: boolean) =>
    Promise.all(
      roots.map((cwd) =>
        fg('**', { cwd, dot: true, absolute: true, onlyDirectories, onlyFiles: !onlyDirectories }),
      ),
    );
  const dirs = [...roots, ...(await scan(true)).flat()];
  const files = (await scan(false)).flat();

  await mkdir(stagingParent, { recursive: true });
  const staging = await mkdtemp(join(stagingParent, '.staging-'));
  const staged: Staged[] = [];

  try {
    for (const [index, original] of files.entries()) {
      const temp = join(staging, index.toString(16));
      await rename(original, temp);
      staged.push([original, temp]);
    }
    await Promise.all(clean.map((path) => rm(path, { recursive: true, force: true })));
    for (const dir of dirs) {
      await mkdir(dir, { recursive: true });
    }
  } finally {
    await restoreStaged(staged);
    await rm(staging, { recursive: true, force: true });
  }
}

/**
 * Remove everything under the partition root except the partition of `mode`.
 * Runs after the partition's fingerprint has been written.
 */
export async function reconcilePartitions(cacheDir: string, mode: Mode): Promise<void> {
  const root = partitionRoot(cacheDir);
  const siblings = await fg('*', { cwd: root, dot: true, absolute: true, onlyFiles: false });
  await cleanButPreserve(siblings, [partitionDir(cacheDir, mode)], cacheDir);
}
