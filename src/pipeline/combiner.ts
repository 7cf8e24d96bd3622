/**
 * Combiner — merges every MP3 in audio-input/ into audio/<timestamp>.mp3 and
 * writes a same-stem .txt tracklist beside it.
 *
 * orderForCombine: prefixed files ("01 Intro.mp3") first, ascending by their
 * two-digit value; unprefixed files after them, in listing order or shuffled.
 *
 * Nothing lands at the final paths unless every probe, the concat and the
 * tracklist write succeed. An existing combined file of the same stamp is
 * never replaced.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { RunConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { SwapError, isSwapError, errorMessage } from '../utils/errors.js';
import { formatDuration, formatRunTimestamp } from '../utils/format.js';
import type { Shuffler } from '../utils/shuffle.js';
import {
  registerTempFile,
  releaseTempFile,
  commitTempFile,
  tempSiblingPath,
} from '../utils/tempfiles.js';
import { listMp3Candidates, trackPrefix, type AudioCandidate } from './candidates.js';
import type { PipelineDeps } from './deps.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface CombineEntry {
  candidate: AudioCandidate;
  /** Start of this track within the combined file, in seconds. */
  offset: number;
  duration: number;
}

export interface CombinePlan {
  entries: CombineEntry[];
  totalDuration: number;
}

export interface CombineResult {
  audioPath: string;
  tracklistPath: string;
  plan: CombinePlan;
}

// ── Ordering ──────────────────────────────────────────────────────────────────

export function orderForCombine(
  candidates: readonly AudioCandidate[],
  shuffle: Shuffler | null,
): AudioCandidate[] {
  const prefixed: Array<{ candidate: AudioCandidate; prefix: number }> = [];
  const unprefixed: AudioCandidate[] = [];

  for (const candidate of candidates) {
    const prefix = trackPrefix(candidate.fileName);
    if (prefix === null) unprefixed.push(candidate);
    else prefixed.push({ candidate, prefix });
  }

  // Array.prototype.sort is stable, so equal prefixes keep listing order
  prefixed.sort((a, b) => a.prefix - b.prefix);

  return [
    ...prefixed.map((p) => p.candidate),
    ...(shuffle ? shuffle(unprefixed) : unprefixed),
  ];
}

// ── Planning ──────────────────────────────────────────────────────────────────

export async function planCombine(
  ordered: readonly AudioCandidate[],
  probe: (filePath: string) => Promise<number>,
): Promise<CombinePlan> {
  const entries: CombineEntry[] = [];
  let offset = 0;

  for (const candidate of ordered) {
    let duration: number;
    try {
      duration = await probe(candidate.path);
    } catch (err) {
      if (isSwapError(err, 'ProbeFailure') || isSwapError(err, 'Interrupted')) throw err;
      throw new SwapError('ProbeFailure', `Could not probe ${candidate.fileName}: ${errorMessage(err)}`, err);
    }
    entries.push({ candidate, offset, duration });
    offset += duration;
  }

  return { entries, totalDuration: offset };
}

export function renderTracklist(plan: CombinePlan): string {
  return plan.entries
    .map((e) => `${formatDuration(e.offset)} ${e.candidate.displayName}`)
    .join('\n') + '\n';
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function combineAudioInputs(
  config: RunConfig,
  deps: PipelineDeps,
): Promise<CombineResult> {
  const inputs = listMp3Candidates(config.audioInputDir);
  if (inputs.length === 0) {
    throw new SwapError('NoInputAudio', `No MP3 files found in ${config.audioInputDir}`);
  }

  const ordered = orderForCombine(inputs, config.shuffleAudioInput ? deps.shuffle : null);
  logger.info('Combiner: combining audio inputs', {
    count: ordered.length,
    shuffled: config.shuffleAudioInput,
  });

  const plan = await planCombine(ordered, (p) => deps.engine.probeDuration(p));

  fs.mkdirSync(config.audioDir, { recursive: true });
  const stamp = formatRunTimestamp(deps.now());
  const audioPath = path.join(config.audioDir, `${stamp}.mp3`);
  const tracklistPath = path.join(config.audioDir, `${stamp}.txt`);
  if (fs.existsSync(audioPath)) {
    throw new SwapError('OutputExists', `Combined audio already exists: ${audioPath}`);
  }
  // Keeps the .mp3 extension so the muxer still infers the format
  const tempPath = registerTempFile(path.join(config.audioDir, `.${stamp}.partial.mp3`));
  const tracklistTemp = registerTempFile(tempSiblingPath(tracklistPath));

  try {
    await deps.engine.concatAudio(ordered.map((c) => c.path), tempPath);
    fs.writeFileSync(tracklistTemp, renderTracklist(plan), 'utf-8');
    // Tracklist first: a stray .txt is never picked, a stray .mp3 would be
    commitTempFile(tracklistTemp, tracklistPath);
    commitTempFile(tempPath, audioPath);
  } finally {
    releaseTempFile(tempPath);
    releaseTempFile(tracklistTemp);
  }

  logger.info('Combiner: combined audio written', {
    audioPath,
    tracklistPath,
    totalDuration: formatDuration(plan.totalDuration),
  });
  return { audioPath, tracklistPath, plan };
}
