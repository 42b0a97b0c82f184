import fg from 'fast-glob';
import picomatch from 'picomatch';
import { isAbsolute, resolve } from 'node:path';
import { BridgeError } from './errors.js';
import { runScript } from './executor.js';
import type { JsonValue, Logger, ModeSettings } from './types.js';

/** Always skipped below a context root */
const ALWAYS_IGNORED = ['**/node_modules/**'];

export interface InputFilters {
  include: readonly string[];
  exclude: readonly string[];
}

function isStringArray(value: JsonValue | undefined): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** Where the context roots of a mode come from */
export interface ContextSource {
  baseDir: string;
  nodeCommand: string;
  contexts: readonly string[];
  contextsScript: string;
}

/**
 * Resolve the directories whose files form a mode's input set. Without
 * explicit contexts the contexts script is asked; its first result payload
 * must be the list of directories.
 */
export async function resolveContexts(
  source: ContextSource,
  mode: ModeSettings,
  log: Logger,
): Promise<string[]> {
  let contexts: readonly string[] = source.contexts;

  if (contexts.length === 0) {
    const [first] = await runScript(
      {
        command: source.nodeCommand,
        cwd: source.baseDir,
        script: source.contextsScript,
        args: [mode.config],
        env: mode.env,
      },
      log,
    );
    if (!isStringArray(first)) {
      throw new BridgeError('Contexts script returned no directory list');
    }
    contexts = first;
  }

  return contexts.map((dir) => (isAbsolute(dir) ? dir : resolve(source.baseDir, dir)));
}

/** Every non-hidden file below the roots that passes the filters, absolute and sorted */
export async function collectInputFiles(roots: readonly string[], filters: InputFilters): Promise<string[]> {
  // Globs without a slash match the file name at any depth
  const isIncluded: (path: string) => boolean =
    filters.include.length > 0 ? picomatch([...filters.include], { basename: true }) : () => true;
  const isExcluded: (path: string) => boolean =
    filters.exclude.length > 0 ? picomatch([...filters.exclude], { basename: true }) : () => false;

  const files = new Set<string>();
  for (const cwd of roots) {
    const matches = await fg('**', { cwd, dot: false, onlyFiles: true, ignore: ALWAYS_IGNORED });
    for (const rel of matches) {
      if (isIncluded(rel) && !isExcluded(rel)) {
        files.add(resolve(cwd, rel));
      }
    }
  }

  return [...files].sort();
}
