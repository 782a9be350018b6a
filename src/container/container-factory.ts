import { stat } from 'fs/promises';
import * as path from 'path';
import { ZIP_CONTAINER_EXTS } from '../config/constants';
import { ContainerError, handleUnknownError } from '../errors/index';
import { DirectoryContainer } from './directory-container';
import { ZipContainer } from './zip-container';
import type { Container } from './types';

/**
 * Opens the container at `containerPath`: a directory tree, or a .zip/.epub
 * archive. Other files are rejected.
 */
export async function openContainer(containerPath: string): Promise<Container> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(containerPath)).isDirectory();
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Opening container');
    throw new ContainerError(`Container path not accessible: ${containerPath} (${err.message})`, 'CONTAINER_ERROR', containerPath);
  }

  if (isDirectory) {
    return new DirectoryContainer(containerPath);
  }

  const ext = path.extname(containerPath).toLowerCase();
  if (ZIP_CONTAINER_EXTS.has(ext)) {
    return ZipContainer.open(containerPath);
  }

  throw new ContainerError(
    `Unsupported container format '${ext || path.basename(containerPath)}': expected a directory or one of ${Array.from(ZIP_CONTAINER_EXTS).join(', ')}`,
    'UNSUPPORTED_CONTAINER',
    containerPath
  );
}
