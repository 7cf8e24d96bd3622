/**
 * Run orchestrator.
 *
 * Resolves the audio source once, probes it once, then replaces the track of
 * each discovered video in turn. Resolution failures abort the run; a failure
 * on one video is recorded and the next video still runs, unless the engine was
 * interrupted, which ends the run.
 */
import * as fs from 'fs';
import * as path from 'path';
import { setImmediate as nextTurn } from 'timers/promises';
import type { RunConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { SwapError, errorMessage, isSwapError, type SwapErrorKind } from '../utils/errors.js';
import { listVideoFiles } from './candidates.js';
import { combineAudioInputs, type CombineResult } from './combiner.js';
import { resolveAudioSource, type ResolvedAudio } from './resolver.js';
import { probeAudioTrack, replaceTrack } from './replacer.js';
import type { PipelineDeps } from './deps.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type RunResult =
  | { videoPath: string; ok: true; outputPath: string }
  | { videoPath: string; ok: false; kind: SwapErrorKind | 'Unexpected'; reason: string };

export interface RunSummary {
  audio: ResolvedAudio;
  results: RunResult[];
  succeeded: number;
  failed: number;
}

// ── Video discovery ───────────────────────────────────────────────────────────

/**
 * --video-input may name one file (taken as given) or a folder to scan;
 * without it the configured video folder is scanned.
 */
export function discoverVideos(config: RunConfig): string[] {
  const target = config.videoInput ?? config.videoDir;
  if (!fs.existsSync(target)) {
    throw new SwapError('NoVideoInput', `Video input not found: ${target}`);
  }

  const videos = fs.statSync(target).isDirectory() ? listVideoFiles(target) : [target];
  if (videos.length === 0) {
    throw new SwapError('NoVideoInput', `No video files found in ${target}`);
  }
  return videos;
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function runCombineOnly(config: RunConfig, deps: PipelineDeps): Promise<CombineResult> {
  logger.info('Pipeline: combine-only run');
  return combineAudioInputs(config, deps);
}

export async function runSwap(config: RunConfig, deps: PipelineDeps): Promise<RunSummary> {
  logger.info('Pipeline: starting run', {
    videoInput: config.videoInput ?? config.videoDir,
    inPlace: config.inPlace,
  });

  // Validate the video side before a combine creates anything
  const videos = discoverVideos(config);
  const audio = await resolveAudioSource(config, deps);
  const track = await probeAudioTrack(audio.path, deps);

  const results: RunResult[] = [];
  for (const videoPath of videos) {
    // Engine calls block; let a pending SIGINT/SIGTERM handler run between videos
    await nextTurn();
    try {
      const { outputPath } = await replaceTrack(videoPath, track, config, deps);
      results.push({ videoPath, ok: true, outputPath });
    } catch (err) {
      if (isSwapError(err, 'Interrupted')) throw err;
      const kind = err instanceof SwapError ? err.kind : 'Unexpected';
      const reason = errorMessage(err);
      logger.error('Pipeline: video failed', { video: path.basename(videoPath), kind, reason });
      results.push({ videoPath, ok: false, kind, reason });
    }
  }

  const failed = results.filter((r) => !r.ok).length;
  const summary: RunSummary = { audio, results, succeeded: results.length - failed, failed };
  logger.info('Pipeline: run complete', { succeeded: summary.succeeded, failed });
  return summary;
}
