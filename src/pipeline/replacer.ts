/**
 * Track replacement — one video in, one video out with the resolved audio
 * trimmed or looped to the video's exact duration.
 *
 * The muxer always writes a hidden temp sibling of the video, which is renamed
 * to the output path (or over the original with inPlace) only on success.
 */
import * as fs from 'fs';
import * as path from 'path';
import { CONTAINER_CODECS, type RunConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { SwapError } from '../utils/errors.js';
import { formatDuration } from '../utils/format.js';
import { registerTempFile, releaseTempFile, commitTempFile } from '../utils/tempfiles.js';
import type { MuxPlan } from '../media/ffmpeg.js';
import type { PipelineDeps } from './deps.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface AudioTrack {
  path: string;
  duration: number;
}

export interface ReplaceResult {
  videoPath: string;
  outputPath: string;
  plan: MuxPlan;
}

// ── Planning ──────────────────────────────────────────────────────────────────

/** Codec override wins; otherwise map the output container's extension. */
export function chooseAudioCodec(outputPath: string, override?: string): string {
  if (override) return override;
  const ext = path.extname(outputPath).toLowerCase();
  const codec = CONTAINER_CODECS[ext];
  if (!codec) {
    throw new SwapError(
      'UnsupportedContainer',
      `No default audio codec for "${ext || '(none)'}" containers; pass --audio-codec`,
    );
  }
  return codec;
}

/** Final location of the processed video: the video itself when replacing in place. */
export function buildOutputPath(videoPath: string, suffix: string, inPlace: boolean): string {
  if (inPlace) return videoPath;
  const { dir, name, ext } = path.parse(videoPath);
  return path.join(dir, `${name}${suffix}${ext}`);
}

/** Hidden sibling the muxer writes to before it is renamed into place. */
export function buildTempOutputPath(videoPath: string): string {
  const { dir, name, ext } = path.parse(videoPath);
  return path.join(dir, `.${name}.swap-tmp${ext}`);
}

/**
 * Trim when the audio covers the video; otherwise play it back to back
 * enough times to cover it. Either way the mux is cut to targetDuration.
 */
export function planMux(
  videoPath: string,
  videoDuration: number,
  audio: AudioTrack,
  outputPath: string,
  codec: string,
): MuxPlan {
  const loop = audio.duration < videoDuration;
  return {
    videoPath,
    audioPath: audio.path,
    outputPath,
    codec,
    targetDuration: videoDuration,
    audioDuration: audio.duration,
    mode: loop ? 'loop' : 'trim',
    plays: loop ? Math.ceil(videoDuration / audio.duration) : 1,
  };
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function probeAudioTrack(audioPath: string, deps: PipelineDeps): Promise<AudioTrack> {
  const duration = await deps.engine.probeDuration(audioPath);
  assertUsableDuration(audioPath, duration);
  return { path: audioPath, duration };
}

function assertUsableDuration(filePath: string, duration: number): void {
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new SwapError('ProbeFailure', `Unusable duration ${duration} for ${filePath}`);
  }
}

export async function replaceTrack(
  videoPath: string,
  audio: AudioTrack,
  config: RunConfig,
  deps: PipelineDeps,
): Promise<ReplaceResult> {
  const videoDuration = await deps.engine.probeDuration(videoPath);
  assertUsableDuration(videoPath, videoDuration);

  const outputPath = buildOutputPath(videoPath, config.suffix, config.inPlace);
  const codec = chooseAudioCodec(outputPath, config.audioCodec);

  if (!config.inPlace && !config.overwrite && fs.existsSync(outputPath)) {
    throw new SwapError('OutputExists', `Output exists: ${outputPath} (use --overwrite)`);
  }

  const tempPath = registerTempFile(buildTempOutputPath(videoPath));
  const plan = planMux(videoPath, videoDuration, audio, tempPath, codec);
  logger.info('Replacer: processing video', {
    video: path.basename(videoPath),
    videoDuration: formatDuration(videoDuration),
    audioDuration: formatDuration(audio.duration),
    mode: plan.mode,
    plays: plan.plays,
    codec,
  });

  try {
    await deps.engine.muxAudio(plan);
    commitTempFile(tempPath, outputPath);
  } finally {
    releaseTempFile(tempPath);
  }

  logger.info('Replacer: video written', { outputPath, inPlace: config.inPlace });
  return { videoPath, outputPath, plan };
}
