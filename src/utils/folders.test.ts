import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { countFilesWithExtensions, isDirectory } from './folders.js';

describe('folder helpers', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'soundtrack-swap-folders-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('counts files by extension, case-insensitively', () => {
    for (const name of ['a.mp3', 'B.MP3', 'notes.txt']) fs.writeFileSync(path.join(dir, name), '');
    expect(countFilesWithExtensions(dir, ['.mp3'])).toBe(2);
  });

  it('returns null for a path that is a regular file', () => {
    const file = path.join(dir, 'video');
    fs.writeFileSync(file, 'not a folder');

    expect(isDirectory(file)).toBe(false);
    expect(countFilesWithExtensions(file, ['.mp4'])).toBeNull();
  });

  it('returns null for a missing path', () => {
    expect(isDirectory(path.join(dir, 'missing'))).toBe(false);
    expect(countFilesWithExtensions(path.join(dir, 'missing'), ['.mp3'])).toBeNull();
  });
});
