/**
 * Command-line surface: commander parses argv, zod validates the result, and
 * execute() dispatches to the listing, combine-only, or full swap flows.
 *
 * execute() never touches process state; index.ts owns exit codes, signal
 * handling, and the real ffmpeg engine.
 */
import { Command } from 'commander';
import { z } from 'zod';
import { AUDIO_PICKS, LIST_SORTS, buildRunConfig, type Env } from './config.js';
import { logger } from './utils/logger.js';
import {
  SwapError,
  errorMessage,
  isInterruptSignal,
  isSwapError,
  type InterruptSignal,
} from './utils/errors.js';
import { listAudioLengths } from './pipeline/lister.js';
import { runCombineOnly, runSwap } from './pipeline/index.js';
import type { PipelineDeps } from './pipeline/deps.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

/** 128 + signal number, as a shell reports a signalled process. */
export const EXIT_SIGNAL: Record<InterruptSignal, number> = { SIGINT: 130, SIGTERM: 143 };

// ── Options ───────────────────────────────────────────────────────────────────

const CliOptionsSchema = z
  .object({
    listAudioLengths:      z.boolean().default(false),
    listAudioInputLengths: z.boolean().default(false),
    listAudioSort:         z.enum(LIST_SORTS).default('name'),
    combine:               z.boolean().default(false),
    combineOnly:           z.boolean().default(false),
    shuffleAudioInput:     z.boolean().default(false),
    audioFile:             z.string().min(1).optional(),
    audioPick:             z.enum(AUDIO_PICKS).default('latest'),
    audioName:             z.string().min(1).optional(),
    videoInput:            z.string().min(1).optional(),
    inPlace:               z.boolean().default(false),
    overwrite:             z.boolean().default(false),
    suffix:                z.string().min(1).optional(),
    audioCodec:            z.string().min(1).optional(),
    videoDir:              z.string().min(1).optional(),
    audioDir:              z.string().min(1).optional(),
    audioInputDir:         z.string().min(1).optional(),
  })
  .refine((o) => o.audioPick !== 'name' || o.audioName !== undefined, {
    message: '--audio-name is required when --audio-pick is name',
    path: ['audioName'],
  });

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function buildProgram(): Command {
  return new Command()
    .name('soundtrack-swap')
    .description('Replace video audio tracks with an MP3 from audio/, combining audio-input/ when needed.')
    .option('--list-audio-lengths', 'List durations of MP3 files in the audio folder and exit')
    .option('--list-audio-input-lengths', 'List durations of MP3 files in the audio-input folder and exit')
    .option('--list-audio-sort <order>', 'Listing order: name or date (default: name)')
    .option('--combine', 'Combine audio-input into a new audio file even when audio/ has MP3s')
    .option('--combine-only', 'Combine audio-input into audio/ and exit without touching videos')
    .option('--shuffle-audio-input', 'Shuffle unnumbered audio-input files when combining')
    .option('--audio-file <path>', 'Explicit MP3 to use instead of picking from audio/')
    .option('--audio-pick <mode>', 'How to pick from several MP3s in audio/: latest, oldest or name (default: latest)')
    .option('--audio-name <name>', 'MP3 to use with --audio-pick name (extension optional)')
    .option('--video-input <path>', 'Video file, or folder of videos, to process instead of video/')
    .option('--in-place', 'Replace each video with its processed version')
    .option('--overwrite', 'Overwrite existing output files')
    .option('--suffix <suffix>', 'Output file suffix when not replacing in place (default: _newaudio)')
    .option('--audio-codec <codec>', 'Audio codec for outputs (default: chosen by container)')
    .option('--video-dir <dir>', 'Folder of input videos (default: video)')
    .option('--audio-dir <dir>', 'Folder of resolved audio (default: audio)')
    .option('--audio-input-dir <dir>', 'Folder of MP3 fragments to combine (default: audio-input)');
}

/** Parse user arguments (argv without the node and script entries). */
export function parseCliOptions(args: string[]): CliOptions {
  const program = buildProgram().exitOverride();
  program.parse(args, { from: 'user' });

  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new SwapError('InvalidArguments', `Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

// ── Dispatch ──────────────────────────────────────────────────────────────────

export interface ExecuteContext {
  deps: PipelineDeps;
  env: Env;
  cwd: string;
  /** Receives report lines meant for the user (listings, run summary). */
  write: (line: string) => void;
}

export async function execute(options: CliOptions, ctx: ExecuteContext): Promise<number> {
  const config = buildRunConfig(options, ctx.env, ctx.cwd);

  try {
    if (options.listAudioLengths || options.listAudioInputLengths) {
      const dirs = [
        ...(options.listAudioLengths ? [config.audioDir] : []),
        ...(options.listAudioInputLengths ? [config.audioInputDir] : []),
      ];
      for (const dir of dirs) {
        const report = await listAudioLengths(dir, options.listAudioSort, ctx.deps.engine);
        report.lines.forEach((line) => ctx.write(line));
      }
      return EXIT_OK;
    }

    if (options.combineOnly) {
      const combined = await runCombineOnly(config, ctx.deps);
      ctx.write(`Combined ${combined.plan.entries.length} file(s) into ${combined.audioPath}`);
      ctx.write(`Tracklist: ${combined.tracklistPath}`);
      return EXIT_OK;
    }

    const summary = await runSwap(config, ctx.deps);
    ctx.write(`Audio: ${summary.audio.path}`);
    for (const result of summary.results) {
      ctx.write(result.ok
        ? `OK: ${result.videoPath} -> ${result.outputPath}`
        : `Failed: ${result.videoPath} (${result.reason})`);
    }
    if (summary.failed > 0) {
      ctx.write(`${summary.failed} of ${summary.results.length} video(s) failed`);
      return EXIT_PARTIAL_FAILURE;
    }
    return EXIT_OK;
  } catch (err) {
    if (isSwapError(err, 'Interrupted')) {
      logger.warn('Run interrupted', { reason: err.message });
      ctx.write(`Interrupted: ${err.message}`);
      return EXIT_SIGNAL[isInterruptSignal(err.cause) ? err.cause : 'SIGINT'];
    }
    logger.error('Run aborted', {
      kind: err instanceof SwapError ? err.kind : 'Unexpected',
      reason: errorMessage(err),
    });
    ctx.write(`Error: ${errorMessage(err)}`);
    return EXIT_FATAL;
  }
}
