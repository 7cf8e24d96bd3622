import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { listAudioLengths } from './lister.js';
import { createWorkspace, type Workspace } from '../__testutils__/workspace.js';

describe('listAudioLengths', () => {
  let ws: Workspace;

  beforeEach(() => {
    ws = createWorkspace();
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('lists durations by name with a total', async () => {
    ws.put(ws.audioDir, 'b.mp3', 'data', 1_600_000_000);
    ws.put(ws.audioDir, 'a.mp3', 'data', 1_700_000_000);
    ws.engine.durations.set('a.mp3', 65.5);
    ws.engine.durations.set('b.mp3', 3600);

    const report = await listAudioLengths(ws.audioDir, 'name', ws.engine);

    expect(report.lines).toEqual([
      'a.mp3: 00:01:06 (65.50s)',
      'b.mp3: 01:00:00 (3600.00s)',
      'Total: 01:01:06 (3665.50s)',
    ]);
    expect(report.totalSeconds).toBe(3665.5);
  });

  it('sorts by modification date when asked', async () => {
    ws.put(ws.audioDir, 'b.mp3', 'data', 1_600_000_000);
    ws.put(ws.audioDir, 'a.mp3', 'data', 1_700_000_000);
    ws.engine.durations.set('a.mp3', 1);
    ws.engine.durations.set('b.mp3', 2);

    const report = await listAudioLengths(ws.audioDir, 'date', ws.engine);
    expect(report.lines.slice(0, 2)).toEqual(['b.mp3: 00:00:02 (2.00s)', 'a.mp3: 00:00:01 (1.00s)']);
  });

  it('says so when the folder holds no MP3s', async () => {
    const dir = path.join(ws.root, 'audio-input');
    const report = await listAudioLengths(dir, 'name', ws.engine);
    expect(report.lines).toEqual([`No MP3 files found in ${dir}`]);
  });
});
