import type { ListSort } from '../config.js';
import { formatDuration } from '../utils/format.js';
import type { MediaEngine } from '../media/ffmpeg.js';
import { byFileName, listMp3Candidates, type AudioCandidate } from './candidates.js';

export interface LengthReport {
  lines: string[];
  totalSeconds: number;
}

function sortCandidates(candidates: AudioCandidate[], sort: ListSort): AudioCandidate[] {
  return sort === 'date'
    ? [...candidates].sort((a, b) => a.mtimeMs - b.mtimeMs || byFileName(a.fileName, b.fileName))
    : [...candidates].sort((a, b) => byFileName(a.fileName, b.fileName));
}

const describe = (seconds: number) => `${formatDuration(seconds)} (${seconds.toFixed(2)}s)`;

/** One "<file>: HH:MM:SS (s.ss s)" line per MP3 in dir, then a Total line. */
export async function listAudioLengths(
  dir: string,
  sort: ListSort,
  engine: Pick<MediaEngine, 'probeDuration'>,
): Promise<LengthReport> {
  const candidates = sortCandidates(listMp3Candidates(dir), sort);
  if (candidates.length === 0) return { lines: [`No MP3 files found in ${dir}`], totalSeconds: 0 };

  const lines: string[] = [];
  let total = 0;
  for (const c of candidates) {
    const duration = await engine.probeDuration(c.path);
    total += duration;
    lines.push(`${c.fileName}: ${describe(duration)}`);
  }
  lines.push(`Total: ${describe(total)}`);
  return { lines, totalSeconds: total };
}
