import { renameSync, rmSync, writeFileSync } from 'node:fs';
import { IOFailureError } from '../errors';

/**
 * Suffix of the temporary file a write goes through before it is renamed into place.
 */
export const PARTIAL_SUFFIX = '.partial';

/**
 * Write UTF-8 text to `path`, replacing any existing file.
 *
 * The content lands in `<path>.partial` first and is renamed over the target,
 * so the target is either the old file or the complete new one.
 *
 * @returns Number of bytes written
 * @throws IOFailureError if the file cannot be written
 */
export function writeFileAtomic(path: string, content: string): number {
  const partialPath = `${path}${PARTIAL_SUFFIX}`;
  const data = Buffer.from(content, 'utf-8');

  try {
    writeFileSync(partialPath, data);
    renameSync(partialPath, path);
  } catch (error) {
    const failure = IOFailureError.fromError(path, error);
    try {
      rmSync(partialPath, { force: true });
    } catch (cleanupError) {
      throw new IOFailureError(`${failure.message} (and could not remove ${partialPath})`, path, {
        errno: failure.errno,
        cause: cleanupError,
      });
    }
    throw failure;
  }

  return data.byteLength;
}

/**
 * Remove a file if it exists.
 *
 * @throws IOFailureError if the file exists but cannot be removed
 */
export function removeFile(path: string): void {
  try {
    rmSync(path, { force: true });
  } catch (error) {
    throw IOFailureError.fromError(path, error);
  }
}
