/**
 * External engine boundary — duration probing, MP3 concatenation, and the
 * audio-replacing mux. Everything media-related happens inside ffmpeg/ffprobe;
 * this module only builds argument lists and interprets exit status.
 *
 * Each call blocks until the child exits. Non-zero exits raise
 * ExternalEngineFailure carrying the tail of stderr; a child ended by SIGINT or
 * SIGTERM raises Interrupted, which ends the whole run.
 */
import { spawnSync, type SpawnSyncReturns } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { SwapError, isInterruptSignal } from '../utils/errors.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface MuxPlan {
  videoPath: string;
  audioPath: string;
  outputPath: string;
  codec: string;
  /** Exact length of the written file; always the video's duration. */
  targetDuration: number;
  audioDuration: number;
  mode: 'trim' | 'loop';
  /** Back-to-back copies of the audio fed to the muxer (1 when trimming). */
  plays: number;
}

export interface MediaEngine {
  probeDuration(filePath: string): Promise<number>;
  concatAudio(inputPaths: string[], outputPath: string): Promise<void>;
  muxAudio(plan: MuxPlan): Promise<void>;
}

export interface FfmpegOptions {
  ffmpegPath: string;
  ffprobePath: string;
  mp3Quality: number;
}

// ── Argument builders ─────────────────────────────────────────────────────────

export function buildProbeArgs(filePath: string): string[] {
  return ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=nw=1:nk=1', filePath];
}

/** Concat demuxer list; single quotes inside paths are closed, escaped, reopened. */
export function buildConcatList(inputPaths: string[]): string {
  return inputPaths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

export function buildConcatArgs(listPath: string, outputPath: string, mp3Quality: number): string[] {
  return [
    '-hide_banner', '-y',
    '-f', 'concat', '-safe', '0', '-i', listPath,
    '-c:a', 'libmp3lame', '-q:a', String(mp3Quality),
    outputPath,
  ];
}

export function buildMuxArgs(plan: MuxPlan): string[] {
  const loopArgs = plan.plays > 1 ? ['-stream_loop', String(plan.plays - 1)] : [];
  return [
    '-hide_banner', '-y',
    '-i', plan.videoPath,
    ...loopArgs, '-i', plan.audioPath,
    '-map', '0:v', '-map', '1:a:0',
    '-c:v', 'copy',
    '-c:a', plan.codec,
    '-t', plan.targetDuration.toFixed(3),
    plan.outputPath,
  ];
}

// ── Helpers ────────────────────────────────────────────────────────────────────

function stderrTail(stderr: string, lines = 8): string {
  return stderr.trim().split('\n').slice(-lines).join('\n');
}

/** stdout of a finished child, or the SwapError its exit status maps to. */
export function engineOutput(result: SpawnSyncReturns<string>, binary: string, label: string): string {
  if (result.error) {
    throw new SwapError('ExternalEngineFailure', `${label}: could not run ${binary}: ${result.error.message}`, result.error);
  }
  if (isInterruptSignal(result.signal)) {
    throw new SwapError('Interrupted', `${label} interrupted by ${result.signal}`, result.signal);
  }
  if (result.status !== 0) {
    const detail = stderrTail(result.stderr ?? '') || `exit ${String(result.status ?? result.signal)}`;
    throw new SwapError('ExternalEngineFailure', `${label} failed: ${detail}`);
  }
  return (result.stdout ?? '').trim();
}

function run(binary: string, args: string[], label: string): string {
  logger.debug(`Engine [${label}]`, { binary, args });
  const result = spawnSync(binary, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
  return engineOutput(result, binary, label);
}

/** True when the binary starts and exits cleanly with -version. */
export function isToolAvailable(binary: string): boolean {
  const result = spawnSync(binary, ['-version'], { stdio: 'ignore' });
  return !result.error && result.status === 0;
}

// ── Public API ─────────────────────────────────────────────────────────────────

export function createFfmpegEngine(opts: FfmpegOptions): MediaEngine {
  return {
    async probeDuration(filePath: string): Promise<number> {
      const raw = run(opts.ffprobePath, buildProbeArgs(filePath), 'probe');
      const duration = parseFloat(raw);
      if (!Number.isFinite(duration) || duration <= 0) {
        throw new SwapError('ProbeFailure', `Could not parse duration for ${filePath}: ${raw || '(empty)'}`);
      }
      logger.debug('Engine: probed duration', { filePath, duration });
      return duration;
    },

    async concatAudio(inputPaths: string[], outputPath: string): Promise<void> {
      if (inputPaths.length === 0) throw new SwapError('NoInputAudio', 'concatAudio: no inputs provided');
      logger.info('Engine: concatenating audio', { count: inputPaths.length, outputPath });

      const listPath = path.join(os.tmpdir(), `soundtrack-swap-concat_${process.pid}_${Date.now()}.txt`);
      fs.writeFileSync(listPath, buildConcatList(inputPaths), 'utf-8');
      try {
        run(opts.ffmpegPath, buildConcatArgs(listPath, outputPath, opts.mp3Quality), 'concat');
      } finally {
        fs.rmSync(listPath, { force: true });
      }
    },

    async muxAudio(plan: MuxPlan): Promise<void> {
      logger.info('Engine: replacing audio track', {
        video: plan.videoPath,
        mode: plan.mode,
        plays: plan.plays,
        codec: plan.codec,
        outputPath: plan.outputPath,
      });
      run(opts.ffmpegPath, buildMuxArgs(plan), 'mux');
    },
  };
}
