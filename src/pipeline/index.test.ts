import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { discoverVideos, runCombineOnly, runSwap } from './index.js';
import { createWorkspace, type Workspace } from '../__testutils__/workspace.js';

describe('discoverVideos', () => {
  let ws: Workspace;

  beforeEach(() => {
    ws = createWorkspace();
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('scans the video folder', () => {
    ws.put(ws.videoDir, 'b.mkv');
    ws.put(ws.videoDir, 'a.mp4');
    ws.put(ws.videoDir, 'readme.txt');

    expect(discoverVideos(ws.config())).toEqual([
      path.join(ws.videoDir, 'a.mp4'),
      path.join(ws.videoDir, 'b.mkv'),
    ]);
  });

  it('takes an explicit video file as given', () => {
    const file = ws.put(ws.root, 'talk.xyz');
    expect(discoverVideos(ws.config({ videoInput: 'talk.xyz' }))).toEqual([file]);
  });

  it('scans an explicit folder', () => {
    fs.mkdirSync(path.join(ws.root, 'other'));
    const file = ws.put(path.join(ws.root, 'other'), 'x.webm');
    expect(discoverVideos(ws.config({ videoInput: 'other' }))).toEqual([file]);
  });

  it('fails when there is nothing to process', () => {
    expect(() => discoverVideos(ws.config())).toThrow(`No video files found in ${ws.videoDir}`);
    expect(() => discoverVideos(ws.config({ videoInput: 'missing.mp4' }))).toThrow(
      `Video input not found: ${path.join(ws.root, 'missing.mp4')}`,
    );
  });
});

describe('runSwap', () => {
  let ws: Workspace;

  beforeEach(() => {
    ws = createWorkspace();
    ws.put(ws.audioDir, 'song.mp3');
    ws.engine.durations.set('song.mp3', 130);
    ws.put(ws.videoDir, 'a.mp4');
    ws.put(ws.videoDir, 'b.mp4');
    ws.engine.durations.set('a.mp4', 100);
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('keeps going after one video fails', async () => {
    ws.engine.brokenFiles.add('b.mp4');

    const summary = await runSwap(ws.config(), ws.deps);

    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.results).toEqual([
      { videoPath: path.join(ws.videoDir, 'a.mp4'), ok: true, outputPath: path.join(ws.videoDir, 'a_newaudio.mp4') },
      {
        videoPath: path.join(ws.videoDir, 'b.mp4'),
        ok: false,
        kind: 'ExternalEngineFailure',
        reason: 'probe failed: b.mp4: Invalid data found when processing input',
      },
    ]);
    expect(fs.existsSync(path.join(ws.videoDir, 'a_newaudio.mp4'))).toBe(true);
  });

  it('probes the audio once per run', async () => {
    ws.engine.durations.set('b.mp4', 200);

    const summary = await runSwap(ws.config(), ws.deps);

    expect(summary.failed).toBe(0);
    expect(ws.engine.probes.filter((p) => p.endsWith('song.mp3'))).toHaveLength(1);
    expect(ws.engine.muxes.map((m) => [m.mode, m.plays])).toEqual([['trim', 1], ['loop', 2]]);
  });

  it('does not combine anything when there are no videos', async () => {
    fs.rmSync(path.join(ws.audioDir, 'song.mp3'));
    ws.put(ws.audioInputDir, 'part.mp3');
    ws.engine.durations.set('part.mp3', 10);

    await expect(runSwap(ws.config({ videoInput: 'nothing-here' }), ws.deps)).rejects.toMatchObject({
      kind: 'NoVideoInput',
    });
    expect(ws.engine.concats).toHaveLength(0);
  });

  it('aborts before any video when audio cannot be resolved', async () => {
    fs.rmSync(path.join(ws.audioDir, 'song.mp3'));

    await expect(runSwap(ws.config(), ws.deps)).rejects.toMatchObject({ kind: 'NoAudioSource' });
    expect(ws.engine.muxes).toHaveLength(0);
  });

  it('stops at the first interrupted video', async () => {
    ws.put(ws.videoDir, 'c.mp4');
    ws.engine.durations.set('b.mp4', 100);
    ws.engine.durations.set('c.mp4', 100);
    ws.engine.interruptedMuxes.set('a.mp4', 'SIGINT');

    await expect(runSwap(ws.config(), ws.deps)).rejects.toMatchObject({
      kind: 'Interrupted',
      message: 'mux interrupted by SIGINT',
    });
    expect(ws.engine.muxes.map((m) => path.basename(m.videoPath))).toEqual(['a.mp4']);
    expect(ws.list(ws.videoDir)).toEqual(['a.mp4', 'b.mp4', 'c.mp4']);
  });
});

describe('runCombineOnly', () => {
  it('combines without touching videos', async () => {
    const ws = createWorkspace();
    try {
      ws.put(ws.videoDir, 'a.mp4');
      ws.put(ws.audioInputDir, 'Intro.mp3');
      ws.engine.durations.set('Intro.mp3', 5);

      const result = await runCombineOnly(ws.config(), ws.deps);

      expect(fs.readFileSync(result.tracklistPath, 'utf-8')).toBe('00:00:00 Intro\n');
      expect(ws.engine.muxes).toHaveLength(0);
      expect(ws.list(ws.videoDir)).toEqual(['a.mp4']);
    } finally {
      ws.cleanup();
    }
  });
});
