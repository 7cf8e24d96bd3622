import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  commitTempFile,
  pendingTempFiles,
  registerTempFile,
  releaseAllTempFiles,
  releaseTempFile,
  tempSiblingPath,
} from './tempfiles.js';

describe('temp file registry', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'soundtrack-swap-tmp-'));
  });

  afterEach(() => {
    releaseAllTempFiles();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('removes registered files on release', () => {
    const tmp = registerTempFile(path.join(dir, '.work.tmp'));
    fs.writeFileSync(tmp, 'x');

    releaseAllTempFiles();

    expect(fs.existsSync(tmp)).toBe(false);
    expect(pendingTempFiles()).toEqual([]);
  });

  it('keeps committed files', () => {
    const tmp = registerTempFile(path.join(dir, '.out.tmp'));
    const final = path.join(dir, 'out.txt');
    fs.writeFileSync(tmp, 'done');

    commitTempFile(tmp, final);
    releaseTempFile(tmp);

    expect(fs.readFileSync(final, 'utf-8')).toBe('done');
    expect(fs.readdirSync(dir)).toEqual(['out.txt']);
  });

  it('names temp files as hidden siblings', () => {
    expect(tempSiblingPath(path.join(dir, 'list.txt'))).toBe(path.join(dir, '.list.txt.tmp'));
  });
});
