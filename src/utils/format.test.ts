import { describe, it, expect } from 'vitest';
import { formatDuration, formatRunTimestamp } from './format.js';

describe('formatDuration', () => {
  it('renders zero', () => {
    expect(formatDuration(0)).toBe('00:00:00');
  });

  it('rounds to whole seconds', () => {
    expect(formatDuration(59.5)).toBe('00:01:00');
    expect(formatDuration(30.4)).toBe('00:00:30');
  });

  it('carries minutes into hours', () => {
    expect(formatDuration(3725.4)).toBe('01:02:05');
  });
});

describe('formatRunTimestamp', () => {
  it('uses local time as YYYY.MM.DD-HH.MM.SS', () => {
    expect(formatRunTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe('2024.01.05-07.08.09');
    expect(formatRunTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('2023.12.31-23.59.58');
  });
});
