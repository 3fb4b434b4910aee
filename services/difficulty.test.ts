import { describe, expect, it } from 'vitest';
import { Difficulty } from '../types';
import { isRecomputePoint, nextDifficulty, rollingAverage } from './difficulty';

describe('nextDifficulty', () => {
  it('moves one level up at or above the promote threshold', () => {
    expect(nextDifficulty(Difficulty.Medium, 9)).toBe(Difficulty.Hard);
    expect(nextDifficulty(Difficulty.Easy, 8.5)).toBe(Difficulty.Medium);
  });

  it('moves one level down at or below the demote threshold', () => {
    expect(nextDifficulty(Difficulty.Hard, 5.5)).toBe(Difficulty.Medium);
    expect(nextDifficulty(Difficulty.Medium, 3)).toBe(Difficulty.Easy);
  });

  it('clamps at both ends', () => {
    expect(nextDifficulty(Difficulty.Hard, 9)).toBe(Difficulty.Hard);
    expect(nextDifficulty(Difficulty.Easy, 4)).toBe(Difficulty.Easy);
  });

  it('walks the whole ladder one step at a time', () => {
    const climb: Difficulty[] = [Difficulty.Easy];
    for (let i = 0; i < 3; i++) climb.push(nextDifficulty(climb[climb.length - 1], 10));
    expect(climb).toEqual([Difficulty.Easy, Difficulty.Medium, Difficulty.Hard, Difficulty.Hard]);

    const descent: Difficulty[] = [Difficulty.Hard];
    for (let i = 0; i < 3; i++) descent.push(nextDifficulty(descent[descent.length - 1], 0));
    expect(descent).toEqual([Difficulty.Hard, Difficulty.Medium, Difficulty.Easy, Difficulty.Easy]);
  });

  it('holds inside the band', () => {
    expect(nextDifficulty(Difficulty.Medium, 7)).toBe(Difficulty.Medium);
    expect(nextDifficulty(Difficulty.Medium, 8.4)).toBe(Difficulty.Medium);
    expect(nextDifficulty(Difficulty.Medium, 5.6)).toBe(Difficulty.Medium);
  });
});

describe('rollingAverage', () => {
  it('averages the whole history without a window', () => {
    expect(rollingAverage([6, 7, 8], null)).toBe(7);
  });

  it('averages only the most recent scores with a window', () => {
    expect(rollingAverage([2, 9, 9], 2)).toBe(9);
  });

  it('is zero for an empty history', () => {
    expect(rollingAverage([])).toBe(0);
  });
});

describe('isRecomputePoint', () => {
  it('fires on every third score', () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(isRecomputePoint)).toEqual([false, false, false, true, false, false, true]);
  });
});
