import fg from 'fast-glob';
import { readFileSync, statSync } from 'fs';
import * as path from 'path';
import { ContainerError, handleUnknownError } from '../errors/index';
import { BaseContainer } from './base-container';
import { splitEntryPath } from './entry-path';

/**
 * Container over an unpacked directory tree. Entries are listed once, on
 * first use, and read lazily from disk.
 */
export class DirectoryContainer extends BaseContainer {
  private listed: { sorted: readonly string[]; known: Set<string> } | undefined;

  constructor(private readonly rootDir: string) {
    super(rootDir);
    let isDirectory = false;
    try {
      isDirectory = statSync(rootDir).isDirectory();
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Opening directory container');
      throw new ContainerError(`Container path not accessible: ${rootDir} (${err.message})`, 'CONTAINER_ERROR', rootDir);
    }
    if (!isDirectory) {
      throw new ContainerError(`Not a directory: ${rootDir}`, 'UNSUPPORTED_CONTAINER', rootDir);
    }
  }

  entries(): readonly string[] {
    return this.list().sorted;
  }

  readEntry(entryPath: string): Uint8Array {
    const entry = splitEntryPath(entryPath).join('/');
    if (!this.list().known.has(entry)) {
      throw new ContainerError(`Entry not found in ${this.rootDir}: ${entryPath}`, 'ENTRY_NOT_FOUND', this.rootDir);
    }
    try {
      return readFileSync(path.join(this.rootDir, ...entry.split('/')));
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Reading container entry');
      throw new ContainerError(`Failed to read ${entryPath}: ${err.message}`, 'CONTAINER_ERROR', this.rootDir);
    }
  }

  private list(): { sorted: readonly string[]; known: Set<string> } {
    if (!this.listed) {
      const found = fg.sync('**/*', { cwd: this.rootDir, onlyFiles: true, dot: true });
      const sorted = Object.freeze([...found].sort());
      this.listed = { sorted, known: new Set(sorted) };
    }
    return this.listed;
  }
}
