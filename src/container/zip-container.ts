import JSZip from 'jszip';
import { readFile } from 'fs/promises';
import { ContainerError, handleUnknownError } from '../errors/index';
import { MemoryContainer } from './memory-container';

/**
 * Container over a zip archive (including EPUB). The archive is decoded once
 * when opened, so reads afterwards are synchronous.
 */
export class ZipContainer extends MemoryContainer {
  static async open(archivePath: string): Promise<ZipContainer> {
    let data: Buffer;
    try {
      data = await readFile(archivePath);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Opening zip container');
      throw new ContainerError(`Container path not accessible: ${archivePath} (${err.message})`, 'CONTAINER_ERROR', archivePath);
    }
    return ZipContainer.fromBuffer(data, archivePath);
  }

  static async fromBuffer(data: Uint8Array, source = 'zip'): Promise<ZipContainer> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Decoding zip container');
      throw new ContainerError(`Invalid zip archive ${source}: ${err.message}`, 'UNSUPPORTED_CONTAINER', source);
    }

    const files = new Map<string, Uint8Array>();
    for (const file of Object.values(zip.files)) {
      if (file.dir) continue;
      files.set(file.name, await file.async('uint8array'));
    }
    return new ZipContainer(files, source);
  }
}
