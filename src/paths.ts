import { isAbsolute, relative } from 'node:path';

/** Path of `file` relative to `base`, or the path itself when it lies outside `base` */
export function relativizedPath(base: string, file: string): string {
  const rel = relative(base, file);
  return rel && !rel.startsWith('..') && !isAbsolute(rel) ? rel : file;
}
