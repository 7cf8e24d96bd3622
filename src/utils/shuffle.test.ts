import { afterEach, describe, it, expect, vi } from 'vitest';
import { keepOrder, shuffleRandom } from './shuffle.js';

describe('shuffleRandom', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns a permutation of its input without mutating it', () => {
    const input = ['a', 'b', 'c', 'd', 'e'];
    const out = shuffleRandom(input);
    expect(input).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect([...out].sort()).toEqual(input);
  });

  it('draws from the remaining pool using Math.random', () => {
    const random = vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(shuffleRandom([1, 2, 3])).toEqual([1, 2, 3]);

    random.mockReturnValue(0.999);
    expect(shuffleRandom([1, 2, 3])).toEqual([3, 2, 1]);
  });

  it('handles empty input', () => {
    expect(shuffleRandom([])).toEqual([]);
  });
});

describe('keepOrder', () => {
  it('copies the input unchanged', () => {
    const input = ['x', 'y'];
    const out = keepOrder(input);
    expect(out).toEqual(['x', 'y']);
    expect(out).not.toBe(input);
  });
});
