import { anchorAtStart } from '../config/patterns';
import { relativeEntryPath } from '../container/entry-path';

/**
 * Names of the first-level directories under `root` that match
 * `directoryPattern` at the start of the name and hold at least one entry.
 */
export function matchPagedDirectories(
  entries: readonly string[],
  root: string,
  directoryPattern: RegExp
): string[] {
  const anchored = anchorAtStart(directoryPattern);
  const directories = new Set<string>();
  for (const entry of entries) {
    const remainder = relativeEntryPath(entry, root);
    if (remainder === undefined) continue;
    const [candidate, ...rest] = remainder.split('/');
    // Files directly in root are not pages
    if (candidate === undefined || rest.length === 0) continue;
    if (anchored.test(candidate)) {
      directories.add(candidate);
    }
  }
  return Array.from(directories).sort();
}
