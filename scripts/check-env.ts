#!/usr/bin/env tsx
/**
 * Pre-flight check for soundtrack-swap.
 * Verifies the media engine is runnable and reports the folder layout.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { existsSync } from 'fs';
import { resolve } from 'path';
import { spawnSync } from 'child_process';
import { config as dotenvConfig } from 'dotenv';
import { countFilesWithExtensions } from '../src/utils/folders.js';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string) => console.log(`  ${YELLOW}○${RESET} ${label}`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

// ── Section: Media engine ─────────────────────────────────────────────────────

console.log(`\n${BOLD}=== soundtrack-swap — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Media engine${RESET}`);

function checkTool(label: string, binary: string): void {
  const result = spawnSync(binary, ['-version'], { encoding: 'utf-8' });
  if (!result.error && result.status === 0) {
    const firstLine = (result.stdout ?? '').split('\n')[0] ?? '';
    pass(label, firstLine.slice(0, 60));
  } else {
    fail(label, `Install ffmpeg or set ${label.toUpperCase()}_PATH (tried "${binary}")`);
    anyRequiredFailed = true;
  }
}

checkTool('ffmpeg',  process.env['FFMPEG_PATH']  ?? 'ffmpeg');
checkTool('ffprobe', process.env['FFPROBE_PATH'] ?? 'ffprobe');

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Configuration${RESET}`);

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value ?? defaultVal;
  note(`${label}  ${effective}${value ? '' : '  (default)'}`);
}

checkOptional('VIDEO_DIR',       process.env['VIDEO_DIR'],       'video');
checkOptional('AUDIO_DIR',       process.env['AUDIO_DIR'],       'audio');
checkOptional('AUDIO_INPUT_DIR', process.env['AUDIO_INPUT_DIR'], 'audio-input');
checkOptional('OUTPUT_SUFFIX',   process.env['OUTPUT_SUFFIX'],   '_newaudio');
checkOptional('MP3_QUALITY',     process.env['MP3_QUALITY'],     '2');
checkOptional('LOG_LEVEL',       process.env['LOG_LEVEL'],       'info');

// ── Section: Folders ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Folders${RESET}`);

const videoDir      = resolve(process.env['VIDEO_DIR']       ?? 'video');
const audioDir      = resolve(process.env['AUDIO_DIR']       ?? 'audio');
const audioInputDir = resolve(process.env['AUDIO_INPUT_DIR'] ?? 'audio-input');

const videoCount = countFilesWithExtensions(videoDir, ['.mp4', '.mov', '.mkv', '.avi', '.m4v', '.webm']);
if (videoCount === null) {
  note(existsSync(videoDir)
    ? `video/  (not a folder: ${videoDir} — pass --video-input instead)`
    : `video/  (missing: ${videoDir} — pass --video-input instead)`);
} else if (videoCount > 0) {
  pass('video/', `${videoCount} video file(s)`);
} else {
  note('video/  (exists but holds no videos — pass --video-input instead)');
}

const audioCount      = countFilesWithExtensions(audioDir, ['.mp3'])      ?? 0;
const audioInputCount = countFilesWithExtensions(audioInputDir, ['.mp3']) ?? 0;

if (audioCount > 0) pass('audio/', `${audioCount} MP3 file(s)`);
else note('audio/  (no MP3s — audio-input/ will be combined)');

if (audioInputCount > 0) pass('audio-input/', `${audioInputCount} MP3 file(s)`);
else note('audio-input/  (no MP3s)');

if (audioCount === 0 && audioInputCount === 0) {
  fail('audio source', `Put an MP3 in ${audioDir} or fragments in ${audioInputDir}, or pass --audio-file`);
  anyRequiredFailed = true;
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start${RESET}\n`);
}
