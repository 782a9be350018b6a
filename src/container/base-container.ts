import { SIMPLE_CONFIG_FILENAME, STRUCTURED_CONFIG_FILENAME } from '../config/constants';
import { entryBasename, splitEntryPath } from './entry-path';
import type { Container } from './types';

/**
 * Picks the entry named `fileName` closest to the container root.
 * Ties at the same depth go to the lexicographically first path.
 */
export function findShallowestEntry(entries: readonly string[], fileName: string): string | undefined {
  let best: { entry: string; depth: number } | undefined;
  for (const entry of entries) {
    if (entryBasename(entry) !== fileName) continue;
    const depth = splitEntryPath(entry).length;
    if (!best || depth < best.depth || (depth === best.depth && entry < best.entry)) {
      best = { entry, depth };
    }
  }
  return best?.entry;
}

export abstract class BaseContainer implements Container {
  private configEntries: { simple: string | undefined; structured: string | undefined } | undefined;

  constructor(public readonly source: string) {}

  abstract entries(): readonly string[];
  abstract readEntry(entryPath: string): Uint8Array;

  hasSimpleConfig(): boolean {
    return this.simpleConfigEntryPath() !== undefined;
  }

  hasStructuredConfig(): boolean {
    return this.structuredConfigEntryPath() !== undefined;
  }

  simpleConfigEntryPath(): string | undefined {
    return this.locateConfigEntries().simple;
  }

  structuredConfigEntryPath(): string | undefined {
    return this.locateConfigEntries().structured;
  }

  private locateConfigEntries(): { simple: string | undefined; structured: string | undefined } {
    if (!this.configEntries) {
      const entries = this.entries();
      this.configEntries = {
        simple: findShallowestEntry(entries, SIMPLE_CONFIG_FILENAME),
        structured: findShallowestEntry(entries, STRUCTURED_CONFIG_FILENAME),
      };
    }
    return this.configEntries;
  }
}
