import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Folder layout, relative to the invocation directory
  VIDEO_DIR:        z.string().min(1).default('video'),
  AUDIO_DIR:        z.string().min(1).default('audio'),
  AUDIO_INPUT_DIR:  z.string().min(1).default('audio-input'),

  // Output naming when not replacing in place
  OUTPUT_SUFFIX:    z.string().min(1).default('_newaudio'),

  // External engine
  FFMPEG_PATH:      z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:     z.string().min(1).default('ffprobe'),
  MP3_QUALITY:      z.coerce.number().int().min(0).max(9).default(2),

  // Logging
  LOG_LEVEL:        z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:       z.enum(['text', 'json']).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export const env = loadEnv(process.env);

// ── Domain Types ─────────────────────────────────────────────────────────────

export const AUDIO_PICKS = ['latest', 'oldest', 'name'] as const;
export type AudioPick = typeof AUDIO_PICKS[number];

export const LIST_SORTS = ['name', 'date'] as const;
export type ListSort = typeof LIST_SORTS[number];

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set<string>([
  '.mp4', '.mov', '.mkv', '.avi', '.m4v', '.webm',
]);

// Output container → audio codec when --audio-codec is not given
export const CONTAINER_CODECS: Readonly<Record<string, string>> = {
  '.webm': 'opus',
  '.mp4':  'aac',
  '.mov':  'aac',
  '.m4v':  'aac',
  '.mkv':  'aac',
  '.avi':  'mp3',
};

// ── Run Config ────────────────────────────────────────────────────────────────

/** Everything a run needs, with folders already resolved to absolute paths. */
export interface RunConfig {
  videoDir: string;
  audioDir: string;
  audioInputDir: string;
  /** Explicit video file or directory; replaces videoDir when set. */
  videoInput?: string;
  audioFile?: string;
  audioPick: AudioPick;
  audioName?: string;
  audioCodec?: string;
  suffix: string;
  inPlace: boolean;
  overwrite: boolean;
  combine: boolean;
  shuffleAudioInput: boolean;
}

export interface RunOverrides {
  videoDir?: string;
  audioDir?: string;
  audioInputDir?: string;
  videoInput?: string;
  audioFile?: string;
  audioPick?: AudioPick;
  audioName?: string;
  audioCodec?: string;
  suffix?: string;
  inPlace?: boolean;
  overwrite?: boolean;
  combine?: boolean;
  shuffleAudioInput?: boolean;
}

/** Merge CLI overrides over env defaults, resolving every path against cwd. */
export function buildRunConfig(overrides: RunOverrides, base: Env, cwd: string): RunConfig {
  const abs = (p: string) => path.resolve(cwd, p);
  return {
    videoDir:          abs(overrides.videoDir ?? base.VIDEO_DIR),
    audioDir:          abs(overrides.audioDir ?? base.AUDIO_DIR),
    audioInputDir:     abs(overrides.audioInputDir ?? base.AUDIO_INPUT_DIR),
    videoInput:        overrides.videoInput === undefined ? undefined : abs(overrides.videoInput),
    audioFile:         overrides.audioFile === undefined ? undefined : abs(overrides.audioFile),
    audioPick:         overrides.audioPick ?? 'latest',
    audioName:         overrides.audioName,
    audioCodec:        overrides.audioCodec,
    suffix:            overrides.suffix ?? base.OUTPUT_SUFFIX,
    inPlace:           overrides.inPlace ?? false,
    overwrite:         overrides.overwrite ?? false,
    combine:           overrides.combine ?? false,
    shuffleAudioInput: overrides.shuffleAudioInput ?? false,
  };
}
