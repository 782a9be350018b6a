import path from 'path';
import { ENTRY_SEPARATOR } from '../config/constants';

// Container entries always use forward slashes
export function toEntryPath(p: string): string {
  return p.replace(/\\/g, ENTRY_SEPARATOR);
}

/**
 * Joins path parts and normalizes the result without a trailing separator.
 * Undefined parts are skipped; nothing left to join yields `.`.
 */
export function normJoin(...parts: Array<string | undefined>): string {
  const defined = parts.filter((p): p is string => p !== undefined).map(toEntryPath);
  if (defined.length === 0) return '.';
  const joined = path.posix.normalize(path.posix.join(...defined));
  return joined.length > 1 && joined.endsWith(ENTRY_SEPARATOR) ? joined.slice(0, -1) : joined;
}

// `.` and the empty string denote the container root: no segments
export function splitEntryPath(p: string): string[] {
  if (!p) return [];
  return path.posix
    .normalize(toEntryPath(p))
    .split(ENTRY_SEPARATOR)
    .filter((segment) => segment !== '' && segment !== '.');
}

/**
 * Returns the part of `entry` below `root`, compared segment by segment, or
 * undefined when the entry is not strictly inside root (`text` does not
 * contain `text2/a.txt`, nor the entry `text` itself).
 */
export function relativeEntryPath(entry: string, root: string): string | undefined {
  const rootSegments = splitEntryPath(root);
  const entrySegments = splitEntryPath(entry);
  if (entrySegments.length <= rootSegments.length) return undefined;
  for (let i = 0; i < rootSegments.length; i++) {
    if (entrySegments[i] !== rootSegments[i]) return undefined;
  }
  return entrySegments.slice(rootSegments.length).join(ENTRY_SEPARATOR);
}

// Directory of an entry, '' for entries at the container root
export function entryDirname(entry: string): string {
  const dir = path.posix.dirname(toEntryPath(entry));
  return dir === '.' ? '' : dir;
}

export function entryBasename(entry: string): string {
  return path.posix.basename(toEntryPath(entry));
}

// Removes the final extension of the file name, keeping any directories
export function stripExtension(entry: string): string {
  const ext = path.posix.extname(entry);
  return ext ? entry.slice(0, -ext.length) : entry;
}
