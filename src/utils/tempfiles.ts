/**
 * Registry of in-flight temporary files.
 *
 * Anything that can fail partway writes to a temp path first and renames it
 * into place on success. While a temp path is registered, an interrupted run
 * removes it on the way out (see releaseAllTempFiles in index.ts).
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from './logger.js';

const pending = new Set<string>();

export function registerTempFile(filePath: string): string {
  pending.add(filePath);
  return filePath;
}

/** Delete a still-registered temp file; a no-op once committed. */
export function releaseTempFile(filePath: string): void {
  if (!pending.delete(filePath)) return;
  try {
    fs.rmSync(filePath, { force: true });
  } catch (err) {
    logger.warn('Temp file could not be removed', { filePath, err: String(err) });
  }
}

export function releaseAllTempFiles(): void {
  for (const filePath of [...pending]) releaseTempFile(filePath);
}

/**
 * Rename a registered temp file over its final path. The rename is atomic on
 * the same filesystem, so callers keep temp files beside their target.
 */
export function commitTempFile(tempPath: string, finalPath: string): void {
  fs.renameSync(tempPath, finalPath);
  pending.delete(tempPath);
}

/** Hidden sibling a file is written to before it is committed. */
export function tempSiblingPath(finalPath: string): string {
  return path.join(path.dirname(finalPath), `.${path.basename(finalPath)}.tmp`);
}

export function pendingTempFiles(): string[] {
  return [...pending];
}
