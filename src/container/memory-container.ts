import { ContainerError } from '../errors/index';
import { BaseContainer } from './base-container';
import { splitEntryPath } from './entry-path';

export type EntryContent = string | Uint8Array;

function canonicalEntry(entryPath: string): string {
  return splitEntryPath(entryPath).join('/');
}

/**
 * Container over entries held in memory. Also the backing store of archive
 * containers, which decode every entry up front.
 */
export class MemoryContainer extends BaseContainer {
  private readonly files = new Map<string, Uint8Array>();
  private readonly sortedEntries: readonly string[];

  constructor(files: Record<string, EntryContent> | Map<string, EntryContent>, source = 'memory') {
    super(source);
    const encoder = new TextEncoder();
    const pairs = files instanceof Map ? Array.from(files.entries()) : Object.entries(files);
    for (const [entryPath, content] of pairs) {
      const entry = canonicalEntry(entryPath);
      if (!entry) continue;
      this.files.set(entry, typeof content === 'string' ? encoder.encode(content) : content);
    }
    this.sortedEntries = Object.freeze(Array.from(this.files.keys()).sort());
  }

  entries(): readonly string[] {
    return this.sortedEntries;
  }

  readEntry(entryPath: string): Uint8Array {
    const content = this.files.get(canonicalEntry(entryPath));
    if (content === undefined) {
      throw new ContainerError(`Entry not found in ${this.source}: ${entryPath}`, 'ENTRY_NOT_FOUND', this.source);
    }
    return content;
  }
}
