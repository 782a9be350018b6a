import { normJoin, relativeEntryPath } from '../container/entry-path';

export function filterTarget(root: string, relativePath: string | undefined): string {
  return relativePath !== undefined ? normJoin(root, relativePath) : root;
}

/**
 * Returns the entries below `root/relativePath` whose remaining path contains
 * a match of `pattern`, sorted and without duplicates.
 */
export function filterEntries(
  entries: readonly string[],
  root: string,
  relativePath: string | undefined,
  pattern: RegExp
): string[] {
  const target = filterTarget(root, relativePath);
  const matched = new Set<string>();
  for (const entry of entries) {
    const remainder = relativeEntryPath(entry, target);
    if (remainder === undefined) continue;
    pattern.lastIndex = 0;
    if (pattern.test(remainder)) {
      matched.add(entry);
    }
  }
  return Array.from(matched).sort();
}
