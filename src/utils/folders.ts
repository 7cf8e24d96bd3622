import * as fs from 'fs';
import * as path from 'path';

/** True only for an existing directory; a regular file at the path is false. */
export function isDirectory(dir: string): boolean {
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

/** Files in dir whose extension is in extensions, or null when dir is not a folder. */
export function countFilesWithExtensions(dir: string, extensions: readonly string[]): number | null {
  if (!isDirectory(dir)) return null;
  return fs.readdirSync(dir).filter((f) => extensions.includes(path.extname(f).toLowerCase())).length;
}
