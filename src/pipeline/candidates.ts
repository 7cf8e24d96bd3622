/**
 * File discovery for the three working folders.
 *
 * Listings are returned in file-name order (plain code-point comparison) so a
 * run over the same folder always sees the same sequence.
 */
import * as fs from 'fs';
import * as path from 'path';
import { VIDEO_EXTENSIONS } from '../config.js';
import { isDirectory } from '../utils/folders.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface AudioCandidate {
  path: string;
  fileName: string;
  mtimeMs: number;
  displayName: string;
}

// ── Names ─────────────────────────────────────────────────────────────────────

// Two digits then space, underscore or dash: "01 Intro", "02_Theme", "10-Outro"
const TRACK_PREFIX = /^(\d{2})[ _-]/;

/** Numeric ordering prefix of a file name, or null when it has none. */
export function trackPrefix(fileName: string): number | null {
  const match = TRACK_PREFIX.exec(fileName);
  return match?.[1] ? parseInt(match[1], 10) : null;
}

export function stem(fileName: string): string {
  return path.parse(fileName).name;
}

/** "01 Theme.mp3" → "Theme"; "Song A.mp3" → "Song A". */
export function displayName(fileName: string): string {
  const base = stem(fileName);
  const stripped = base.replace(TRACK_PREFIX, '');
  return stripped.length > 0 ? stripped : base;
}

export function byFileName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ── Listing ───────────────────────────────────────────────────────────────────

function listFiles(dir: string): string[] {
  if (!isDirectory(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    // Hidden names are our own in-flight temp files
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort(byFileName);
}

export function isMp3(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.mp3';
}

export function toCandidate(filePath: string): AudioCandidate {
  const fileName = path.basename(filePath);
  return {
    path: filePath,
    fileName,
    mtimeMs: fs.statSync(filePath).mtimeMs,
    displayName: displayName(fileName),
  };
}

/** MP3 files directly inside dir; a missing dir (or a file) is treated as empty. */
export function listMp3Candidates(dir: string): AudioCandidate[] {
  return listFiles(dir)
    .filter((name) => isMp3(name))
    .map((name) => toCandidate(path.join(dir, name)));
}

export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function listVideoFiles(dir: string): string[] {
  return listFiles(dir)
    .filter((name) => isVideoFile(name))
    .map((name) => path.join(dir, name));
}
