/**
 * In-process stand-ins for tests: a MediaEngine fake that answers probes from a
 * table and "writes" outputs as small text files, plus a throwaway folder
 * layout under the OS temp dir.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildRunConfig, loadEnv, type RunConfig, type RunOverrides } from '../config.js';
import { SwapError, type InterruptSignal } from '../utils/errors.js';
import { keepOrder } from '../utils/shuffle.js';
import type { MediaEngine, MuxPlan } from '../media/ffmpeg.js';
import type { PipelineDeps } from '../pipeline/deps.js';

export class FakeEngine implements MediaEngine {
  /** Durations keyed by file name. */
  readonly durations = new Map<string, number>();
  /** File names whose probe exits non-zero. */
  readonly brokenFiles = new Set<string>();
  /** Video file names whose mux exits non-zero. */
  readonly failingMuxes = new Set<string>();
  /** Video file names whose mux child is killed by a signal. */
  readonly interruptedMuxes = new Map<string, InterruptSignal>();
  failConcat = false;

  readonly probes: string[] = [];
  readonly concats: Array<{ inputs: string[]; outputPath: string }> = [];
  readonly muxes: MuxPlan[] = [];

  async probeDuration(filePath: string): Promise<number> {
    this.probes.push(filePath);
    const name = path.basename(filePath);
    if (this.brokenFiles.has(name)) {
      throw new SwapError('ExternalEngineFailure', `probe failed: ${name}: Invalid data found when processing input`);
    }
    const duration = this.durations.get(name);
    if (duration === undefined) throw new SwapError('ProbeFailure', `Could not parse duration for ${filePath}`);
    return duration;
  }

  async concatAudio(inputs: string[], outputPath: string): Promise<void> {
    this.concats.push({ inputs, outputPath });
    fs.writeFileSync(outputPath, inputs.map((p) => path.basename(p)).join('\n'));
    if (this.failConcat) throw new SwapError('ExternalEngineFailure', 'concat failed: disk full');
  }

  async muxAudio(plan: MuxPlan): Promise<void> {
    this.muxes.push(plan);
    const name = path.basename(plan.videoPath);
    fs.writeFileSync(plan.outputPath, `partial ${name}`);
    if (this.failingMuxes.has(name)) throw new SwapError('ExternalEngineFailure', `mux failed: ${name}`);
    const signal = this.interruptedMuxes.get(name);
    if (signal) throw new SwapError('Interrupted', `mux interrupted by ${signal}`, signal);
    fs.writeFileSync(plan.outputPath, `muxed ${name} with ${path.basename(plan.audioPath)}`);
  }
}

export interface Workspace {
  root: string;
  videoDir: string;
  audioDir: string;
  audioInputDir: string;
  engine: FakeEngine;
  deps: PipelineDeps;
  config(overrides?: RunOverrides): RunConfig;
  /** Create a file; mtimeSec sets both atime and mtime. */
  put(dir: string, name: string, content?: string, mtimeSec?: number): string;
  list(dir: string): string[];
  cleanup(): void;
}

export const FIXED_NOW = new Date(2024, 2, 1, 13, 4, 5);

export function createWorkspace(): Workspace {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'soundtrack-swap-test-'));
  const videoDir = path.join(root, 'video');
  const audioDir = path.join(root, 'audio');
  const audioInputDir = path.join(root, 'audio-input');
  for (const dir of [videoDir, audioDir, audioInputDir]) fs.mkdirSync(dir);

  const engine = new FakeEngine();
  const env = loadEnv({});

  return {
    root,
    videoDir,
    audioDir,
    audioInputDir,
    engine,
    deps: { engine, shuffle: keepOrder, now: () => FIXED_NOW },
    config: (overrides = {}) => buildRunConfig(overrides, env, root),
    put(dir: string, name: string, content = 'data', mtimeSec?: number) {
      const filePath = path.join(dir, name);
      fs.writeFileSync(filePath, content);
      if (mtimeSec !== undefined) fs.utimesSync(filePath, mtimeSec, mtimeSec);
      return filePath;
    },
    list: (dir) => fs.readdirSync(dir).sort(),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}
