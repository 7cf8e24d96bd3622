#!/usr/bin/env node
/**
 * soundtrack-swap — entry point.
 *
 * Checks that ffmpeg/ffprobe are runnable, wires the real engine into the
 * pipeline, and maps the run outcome to the process exit code:
 *   0 — everything succeeded
 *   1 — fatal error (bad arguments, no audio, no videos, missing engine)
 *   2 — at least one video failed
 *   130 / 143 — interrupted by SIGINT / SIGTERM
 */
import { CommanderError } from 'commander';
import { env } from './config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { shuffleRandom } from './utils/shuffle.js';
import { releaseAllTempFiles } from './utils/tempfiles.js';
import { createFfmpegEngine, isToolAvailable } from './media/ffmpeg.js';
import { EXIT_FATAL, EXIT_SIGNAL, execute, parseCliOptions, type CliOptions } from './cli.js';

// ── Interrupts ────────────────────────────────────────────────────────────────

function installSignalCleanup(): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.warn('Interrupted — removing temporary files', { signal });
      releaseAllTempFiles();
      process.exit(EXIT_SIGNAL[signal]);
    });
  }
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

/** Parsed options, or the exit code when parsing ends the run. */
function readOptions(): CliOptions | number {
  try {
    return parseCliOptions(process.argv.slice(2));
  } catch (err) {
    // commander has already printed help or the usage error
    if (err instanceof CommanderError) return err.exitCode;
    process.stderr.write(`${errorMessage(err)}\n`);
    return EXIT_FATAL;
  }
}

async function main(): Promise<number> {
  const options = readOptions();
  if (typeof options === 'number') return options;

  for (const tool of [env.FFMPEG_PATH, env.FFPROBE_PATH]) {
    if (!isToolAvailable(tool)) {
      process.stderr.write(`Missing required tool: ${tool}\n`);
      return EXIT_FATAL;
    }
  }

  installSignalCleanup();

  const engine = createFfmpegEngine({
    ffmpegPath: env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
    mp3Quality: env.MP3_QUALITY,
  });

  try {
    return await execute(options, {
      deps: { engine, shuffle: shuffleRandom, now: () => new Date() },
      env,
      cwd: process.cwd(),
      write: (line) => process.stdout.write(`${line}\n`),
    });
  } finally {
    releaseAllTempFiles();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error('Fatal startup error', { err: errorMessage(err) });
    process.exit(EXIT_FATAL);
  });
