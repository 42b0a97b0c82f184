import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { FingerprintFile } from './types.js';

export const FINGERPRINT_FILE = 'fingerprint.json';

/** Compute SHA-256 hash of a file's content on disk */
export async function computeFileHash(absolutePath: string): Promise<string> {
  const content = await readFile(absolutePath);
  return createHash('sha256').update(content).digest('hex');
}

/** Hash every input in parallel; keys come out sorted so equal sets serialize equally */
export async function computeFingerprint(paths: readonly string[]): Promise<Record<string, string>> {
  const entries = await Promise.all(
    [...new Set(paths)].sort().map(async (path) => {
      try {
        return [path, await computeFileHash(path)] as const;
      } catch {
        // Unreadable or deleted: left out, so its absence still changes the fingerprint
        return null;
      }
    }),
  );

  return Object.fromEntries(entries.filter((e): e is NonNullable<typeof e> => e !== null));
}

function isFingerprintFile(value: unknown): value is FingerprintFile {
  if (typeof value !== 'object' || value === null) return false;
  if (!('version' in value) || value.version !== 1) return false;
  if (!('files' in value) || typeof value.files !== 'object' || value.files === null) return false;
  return Object.values(value.files).every((hash) => typeof hash === 'string');
}

/** Load a partition's fingerprint; missing or corrupted files read as null */
export async function loadFingerprint(partitionDir: string): Promise<Record<string, string> | null> {
  try {
    const raw = await readFile(join(partitionDir, FINGERPRINT_FILE), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return isFingerprintFile(parsed) ? parsed.files : null;
  } catch {
    return null;
  }
}

/** Persist a partition's fingerprint, replacing the previous one in a single rename */
export async function saveFingerprint(partitionDir: string, files: Record<string, string>): Promise<void> {
  await mkdir(partitionDir, { recursive: true });
  const target = join(partitionDir, FINGERPRINT_FILE);
  const pending = `${target}.${process.pid}.tmp`;
  const content: FingerprintFile = { version: 1, files };
  await writeFile(pending, JSON.stringify(content, null, 2) + '\n');
  await rename(pending, target);
}

/** Find files that changed between two fingerprints */
export function findChangedFiles(
  previous: Record<string, string>,
  current: Record<string, string>,
): string[] {
  const changed: string[] = [];

  // Files that are new or have different hashes
  for (const [path, hash] of Object.entries(current)) {
    if (previous[path] !== hash) {
      changed.push(path);
    }
  }

  // Files that were in the previous fingerprint but not in the current one
  for (const path of Object.keys(previous)) {
    if (!(path in current)) {
      changed.push(path);
    }
  }

  return changed;
}

/** What runIfChanged did */
export type CacheOutcome =
  | { ran: false }
  | { ran: true; changedFiles: string[] | null };

/**
 * Run `action` unless the content fingerprint of `inputs` matches the one stored
 * in `partitionDir`. The new fingerprint is stored only once `action` resolves,
 * so a failed run is retried next time.
 */
export async function runIfChanged(
  partitionDir: string,
  inputs: readonly string[],
  action: (changedFiles: string[] | null) => Promise<void>,
): Promise<CacheOutcome> {
  const current = await computeFingerprint(inputs);
  const previous = await loadFingerprint(partitionDir);

  // null: no prior fingerprint, everything counts as changed
  const changedFiles = previous ? findChangedFiles(previous, current) : null;
  if (changedFiles !== null && changedFiles.length === 0) {
    return { ran: false };
  }

  await action(changedFiles);
  await saveFingerprint(partitionDir, current);
  return { ran: true, changedFiles };
}
