/**
 * Source resolution — decides which single MP3 feeds every video in the run.
 *
 * Precedence: --audio-file, then a pick from audio/ (unless --combine forces
 * a fresh combine), then a newly combined file from audio-input/.
 */
import * as fs from 'fs';
import type { AudioPick, RunConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { SwapError, isSwapError } from '../utils/errors.js';
import { byFileName, isMp3, listMp3Candidates, stem, type AudioCandidate } from './candidates.js';
import { combineAudioInputs } from './combiner.js';
import type { PipelineDeps } from './deps.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type AudioSourceOrigin = 'explicit-file' | 'picked' | 'combined';

export interface ResolvedAudio {
  path: string;
  origin: AudioSourceOrigin;
  /** Set for origin 'combined'. */
  tracklistPath?: string;
}

// ── Selection ─────────────────────────────────────────────────────────────────

function byMtimeThenName(a: AudioCandidate, b: AudioCandidate): number {
  return a.mtimeMs - b.mtimeMs || byFileName(a.fileName, b.fileName);
}

function matchesName(candidate: AudioCandidate, wanted: string): boolean {
  const w = wanted.toLowerCase();
  const names = [candidate.fileName, stem(candidate.fileName), candidate.displayName];
  return names.some((n) => {
    const lower = n.toLowerCase();
    return lower === w || `${lower}.mp3` === w;
  });
}

/**
 * Apply a selection policy to a non-empty candidate set.
 * Throws AmbiguousSelection for several name matches and NoAudioSource for none.
 */
export function pickCandidate(
  candidates: readonly AudioCandidate[],
  pick: AudioPick,
  name: string | undefined,
): AudioCandidate {
  const sorted = [...candidates].sort(byMtimeThenName);
  const oldest = sorted[0];
  const latest = sorted[sorted.length - 1];
  if (!oldest || !latest) throw new SwapError('NoAudioSource', 'No MP3 candidates to pick from');

  switch (pick) {
    case 'latest':
      return latest;
    case 'oldest':
      return oldest;
    case 'name': {
      if (!name) throw new SwapError('InvalidArguments', '--audio-name is required when using --audio-pick name');
      const matches = candidates.filter((c) => matchesName(c, name));
      const [only, ...rest] = matches;
      if (!only) throw new SwapError('NoAudioSource', `No MP3 named ${name}`);
      if (rest.length > 0) {
        throw new SwapError(
          'AmbiguousSelection',
          `Multiple matches for --audio-name ${name}: ${matches.map((m) => m.fileName).join(', ')}`,
        );
      }
      return only;
    }
  }
}

function resolveExplicitFile(filePath: string): ResolvedAudio {
  if (!isMp3(filePath)) {
    throw new SwapError('NoAudioSource', `Audio file is not an MP3: ${filePath}`);
  }
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new SwapError('NoAudioSource', `Audio file not found: ${filePath}`);
  }
  return { path: filePath, origin: 'explicit-file' };
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function resolveAudioSource(
  config: RunConfig,
  deps: PipelineDeps,
): Promise<ResolvedAudio> {
  if (config.audioFile) {
    const resolved = resolveExplicitFile(config.audioFile);
    logger.info('Resolver: using explicit audio file', { path: resolved.path });
    return resolved;
  }

  if (!config.combine) {
    const candidates = listMp3Candidates(config.audioDir);
    if (candidates.length > 0) {
      const picked = pickCandidate(candidates, config.audioPick, config.audioName);
      logger.info('Resolver: picked audio from folder', {
        pick: config.audioPick,
        file: picked.fileName,
        of: candidates.length,
      });
      return { path: picked.path, origin: 'picked' };
    }
    logger.info('Resolver: audio folder empty — combining inputs', { audioDir: config.audioDir });
  }

  try {
    const combined = await combineAudioInputs(config, deps);
    return { path: combined.audioPath, origin: 'combined', tracklistPath: combined.tracklistPath };
  } catch (err) {
    // Both folders empty: nothing to pick and nothing to combine
    if (isSwapError(err, 'NoInputAudio') && !config.combine) {
      throw new SwapError(
        'NoAudioSource',
        `No audio source found in ${config.audioDir} or ${config.audioInputDir}`,
        err,
      );
    }
    throw err;
  }
}
