import type { Difficulty } from "../types";
import { COACHING_POLICY } from "./policy";

/**
 * Staircase transition over the policy's level ladder: at most one step per
 * call, clamped at both ends.
 */
export const nextDifficulty = (current: Difficulty, averageScore: number): Difficulty => {
  const { PROMOTE_AT, DEMOTE_AT, LEVELS } = COACHING_POLICY.DIFFICULTY;

  const step = averageScore >= PROMOTE_AT ? 1 : averageScore <= DEMOTE_AT ? -1 : 0;
  const index = LEVELS.indexOf(current) + step;

  return LEVELS[Math.min(LEVELS.length - 1, Math.max(0, index))];
};

/**
 * Average the adaptive controller works from. With no window it is the whole
 * history; with a window, the most recent `window` scores.
 */
export const rollingAverage = (scores: readonly number[], window: number | null = COACHING_POLICY.DIFFICULTY.WINDOW): number => {
  const slice = window === null ? scores : scores.slice(-window);
  if (slice.length === 0) return 0;
  return slice.reduce((a, b) => a + b, 0) / slice.length;
};

export const isRecomputePoint = (scoredCount: number): boolean =>
  scoredCount > 0 && scoredCount % COACHING_POLICY.DIFFICULTY.RECOMPUTE_EVERY === 0;
