import { Difficulty } from "../types";

// ============================================================================
// THE COACHING POLICY
// Every threshold, bound and fallback value the engine applies lives here.
// Runtime overrides come from services/config.ts; everything else reads this.
// ============================================================================

export const COACHING_POLICY = {
  CRITIQUE: {
    THRESHOLD: 7.0,          // Scores strictly below this trigger another iteration
    MAX_ITERATIONS: 3,       // Generate/critique rounds per question
    MIN_SCORE: 0,
    MAX_SCORE: 10,
    FALLBACK: {
      SCORE: 7.0,            // Neutral value for every dimension and overall
      STRENGTHS: ['Answer provided'],
      IMPROVEMENTS: ['Could be more specific'],
    },
  },

  EXTRACTION: {
    FALLBACK_KEY_POINTS: ['Review the full answer'],
    FALLBACK_DELIVERY_TIPS: ['Practice delivery out loud'],
  },

  GENERATION: {
    TEMPERATURE: 0.7,
    ANALYSIS_TEMPERATURE: 0.3,
    CREATIVE_TEMPERATURE: 0.8,
    MODEL: 'gemini-3-flash-preview',
    PLACEHOLDER_ANSWER: 'No answer could be generated for this question. Try again once the model is reachable.',
  },

  DIFFICULTY: {
    INITIAL: Difficulty.Medium,
    PROMOTE_AT: 8.5,         // Average >= this moves one level up
    DEMOTE_AT: 5.5,          // Average <= this moves one level down
    RECOMPUTE_EVERY: 3,      // Scored mock answers between adjustments
    WINDOW: null,            // null = average of the whole history; config may set a size
    LEVELS: [Difficulty.Easy, Difficulty.Medium, Difficulty.Hard],
  },

  FOLLOW_UP: {
    MAX_DEPTH: 3,
  },

  RESEARCH: {
    TTL_DAYS: 7,
    NEWS_LOOKBACK_DAYS: 180,
    CONTEXT_CHARS: 500,      // Research excerpt handed to question generation
  },

  MOCK: {
    QUESTION_COUNT: 15,
    MIX: {
      behavioral: 0.4,
      technical: 0.4,        // Situational takes the remainder
    },
    FRAMEWORKS: {
      behavioral: 'STAR',
      technical: 'Direct',
      situational: 'CAR',
    },
  },

  SESSION: {
    CONTEXT_WINDOW: 10,      // Conversation entries handed to the next pipeline run
    RECENT_CRITIQUES: 5,
    MAX_LOG_ENTRIES: 200,
  },

  PROFILE: {
    CHUNK_SIZE: 1000,
    CHUNK_OVERLAP: 200,
    CV_RESULTS: 3,
    EXPERIENCE_RESULTS: 3,
    PERSONALITY_RESULTS: 2,
  },
};

export const DAY_MS = 24 * 60 * 60 * 1000;
