import { COACHING_POLICY } from "./policy";
import { ConfigError } from "./errors";

export interface CoachConfig {
  apiKey: string | null;
  model: string;
  temperature: number;
  maxIterations: number;
  critiqueThreshold: number;
  followUpDepth: number;
  researchCacheDays: number;
  mockQuestionCount: number;
  difficultyWindow: number | null;
}

type Env = Record<string, string | undefined>;

const readNumber = (env: Env, key: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigError(`${key} must be >= ${opts.min}, got ${value}`);
  }
  return value;
};

/**
 * Builds the runtime configuration from environment variables, falling back to
 * the policy defaults for anything unset.
 */
export const loadConfig = (env: Env = process.env): CoachConfig => {
  const { CRITIQUE, GENERATION, FOLLOW_UP, RESEARCH, MOCK, DIFFICULTY } = COACHING_POLICY;
  const window = env.DIFFICULTY_WINDOW;

  return {
    apiKey: env.GEMINI_API_KEY?.trim() || null,
    model: env.GEMINI_MODEL?.trim() || GENERATION.MODEL,
    temperature: readNumber(env, 'COACH_TEMPERATURE', GENERATION.TEMPERATURE, { min: 0 }),
    maxIterations: readNumber(env, 'MAX_ITERATIONS', CRITIQUE.MAX_ITERATIONS, { integer: true, min: 1 }),
    critiqueThreshold: readNumber(env, 'CRITIQUE_THRESHOLD', CRITIQUE.THRESHOLD, { min: 0 }),
    followUpDepth: readNumber(env, 'FOLLOW_UP_DEPTH', FOLLOW_UP.MAX_DEPTH, { integer: true, min: 0 }),
    researchCacheDays: readNumber(env, 'RESEARCH_CACHE_DAYS', RESEARCH.TTL_DAYS, { min: 0 }),
    mockQuestionCount: readNumber(env, 'MOCK_QUESTION_COUNT', MOCK.QUESTION_COUNT, { integer: true, min: 1 }),
    difficultyWindow: window === undefined || window.trim() === ''
      ? DIFFICULTY.WINDOW
      : readNumber(env, 'DIFFICULTY_WINDOW', 0, { integer: true, min: 1 }),
  };
};
