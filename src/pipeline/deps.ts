import type { MediaEngine } from '../media/ffmpeg.js';
import type { Shuffler } from '../utils/shuffle.js';

/** Collaborators injected into every pipeline stage. */
export interface PipelineDeps {
  engine: MediaEngine;
  shuffle: Shuffler;
  /** Run start time; names combined audio. */
  now: () => Date;
}
