export type Shuffler = <T>(items: readonly T[]) => T[];

/** Uniform random permutation: draw each next item from what is left. */
export const shuffleRandom: Shuffler = <T>(items: readonly T[]): T[] => {
  const pool = [...items];
  const out: T[] = [];
  while (pool.length > 0) {
    const j = Math.floor(Math.random() * pool.length);
    out.push(...pool.splice(j, 1));
  }
  return out;
};

export const keepOrder: Shuffler = <T>(items: readonly T[]): T[] => [...items];
