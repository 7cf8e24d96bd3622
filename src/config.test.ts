import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { buildRunConfig, loadEnv } from './config.js';

describe('loadEnv', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadEnv({})).toEqual({
      VIDEO_DIR: 'video',
      AUDIO_DIR: 'audio',
      AUDIO_INPUT_DIR: 'audio-input',
      OUTPUT_SUFFIX: '_newaudio',
      FFMPEG_PATH: 'ffmpeg',
      FFPROBE_PATH: 'ffprobe',
      MP3_QUALITY: 2,
      LOG_LEVEL: 'info',
      LOG_FORMAT: 'text',
    });
  });

  it('coerces numeric settings', () => {
    expect(loadEnv({ MP3_QUALITY: '0' }).MP3_QUALITY).toBe(0);
  });

  it('names every invalid variable', () => {
    expect(() => loadEnv({ MP3_QUALITY: '11', LOG_LEVEL: 'loud' })).toThrow(
      'Invalid environment variables: MP3_QUALITY, LOG_LEVEL',
    );
  });
});

describe('buildRunConfig', () => {
  const base = loadEnv({ AUDIO_DIR: 'tracks' });
  const cwd = path.resolve('/work');

  it('resolves env folders against the working directory', () => {
    const config = buildRunConfig({}, base, cwd);
    expect(config).toEqual({
      videoDir: path.join(cwd, 'video'),
      audioDir: path.join(cwd, 'tracks'),
      audioInputDir: path.join(cwd, 'audio-input'),
      videoInput: undefined,
      audioFile: undefined,
      audioPick: 'latest',
      audioName: undefined,
      audioCodec: undefined,
      suffix: '_newaudio',
      inPlace: false,
      overwrite: false,
      combine: false,
      shuffleAudioInput: false,
    });
  });

  it('lets overrides win and keeps absolute paths', () => {
    const config = buildRunConfig(
      { audioDir: '/srv/music', audioFile: 'pick.mp3', videoInput: 'one.mp4', suffix: '_v2' },
      base,
      cwd,
    );
    expect(config.audioDir).toBe(path.resolve('/srv/music'));
    expect(config.audioFile).toBe(path.join(cwd, 'pick.mp3'));
    expect(config.videoInput).toBe(path.join(cwd, 'one.mp4'));
    expect(config.suffix).toBe('_v2');
  });
});
