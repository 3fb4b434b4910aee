import type { Difficulty } from "../types";
import type { CritiqueDimension, CritiqueResult, FollowUpSuggestion, QuestionType } from "../types";
import { COACHING_POLICY } from "./policy";

// ============================================================================
// STRUCTURED OUTPUT PARSING
// Model output is untrusted text. Every parser returns a tagged outcome so
// callers can tell a genuine value from a substituted default.
// ============================================================================

export type ParseOutcome<T> =
  | { kind: 'parsed'; value: T }
  | { kind: 'fallback'; value: T; reason: string };

export const parsed = <T>(value: T): ParseOutcome<T> => ({ kind: 'parsed', value });
export const fallback = <T>(value: T, reason: string): ParseOutcome<T> => ({ kind: 'fallback', value, reason });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toStringList = (value: unknown): string[] =>
  Array.isArray(value)
    ? value.filter((v): v is string => typeof v === 'string').map(v => v.trim()).filter(v => v.length > 0)
    : [];

const clampScore = (n: number): number => {
  const { MIN_SCORE, MAX_SCORE } = COACHING_POLICY.CRITIQUE;
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, n));
};

/**
 * Pulls a JSON value out of model text. Tolerates markdown fences and prose
 * around a single object or array.
 */
export const extractJson = (raw: string): unknown => {
  const cleaned = raw
    .replace(/```json/gi, '```')
    .replace(/```/g, '')
    .trim();

  try {
    return JSON.parse(cleaned);
  } catch {
    const match = cleaned.match(/[[{][\s\S]*[\]}]/);
    if (!match) throw new Error('No JSON found in model output');
    return JSON.parse(match[0]);
  }
};

const tryExtract = (raw: string): { ok: true; value: unknown } | { ok: false; reason: string } => {
  try {
    return { ok: true, value: extractJson(raw) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'Unparseable output' };
  }
};

// --- Critique ---

const scoreSheet = (pick: (dimension: CritiqueDimension) => number): Record<CritiqueDimension, number> => ({
  authenticity: pick('authenticity'),
  relevance: pick('relevance'),
  structure: pick('structure'),
  specificity: pick('specificity'),
  impact: pick('impact'),
  length: pick('length'),
});

export const fallbackCritique = (reason: string): CritiqueResult => {
  const { FALLBACK } = COACHING_POLICY.CRITIQUE;
  return {
    scores: scoreSheet(() => FALLBACK.SCORE),
    overall: FALLBACK.SCORE,
    strengths: [...FALLBACK.STRENGTHS],
    improvements: [...FALLBACK.IMPROVEMENTS],
    isFallback: true,
    fallbackReason: reason,
  };
};

export const parseCritique = (raw: string): ParseOutcome<CritiqueResult> => {
  const extracted = tryExtract(raw);
  if (!extracted.ok) return fallback(fallbackCritique(extracted.reason), extracted.reason);

  const data = extracted.value;
  if (!isRecord(data) || typeof data.overall !== 'number' || !Number.isFinite(data.overall)) {
    const reason = 'Critique is missing a numeric overall score';
    return fallback(fallbackCritique(reason), reason);
  }

  const overall = clampScore(data.overall);
  const rawScores: Record<string, unknown> = isRecord(data.scores) ? data.scores : {};
  // A dimension the model left out inherits the overall score
  const scores = scoreSheet(dimension => {
    const value = rawScores[dimension];
    return typeof value === 'number' && Number.isFinite(value) ? clampScore(value) : overall;
  });

  const factCheck = typeof data.factCheck === 'string' ? data.factCheck
    : typeof data.fact_check === 'string' ? data.fact_check
    : undefined;

  return parsed({
    scores,
    overall,
    strengths: toStringList(data.strengths),
    improvements: toStringList(data.improvements),
    ...(factCheck ? { factCheck } : {}),
    isFallback: false,
  });
};

// --- Key points ---

export interface KeyPoints {
  keyPoints: string[];
  deliveryTips: string[];
}

export const fallbackKeyPoints = (): KeyPoints => ({
  keyPoints: [...COACHING_POLICY.EXTRACTION.FALLBACK_KEY_POINTS],
  deliveryTips: [...COACHING_POLICY.EXTRACTION.FALLBACK_DELIVERY_TIPS],
});

export const parseKeyPoints = (raw: string): ParseOutcome<KeyPoints> => {
  const extracted = tryExtract(raw);
  if (!extracted.ok) return fallback(fallbackKeyPoints(), extracted.reason);

  const data = extracted.value;
  if (!isRecord(data)) return fallback(fallbackKeyPoints(), 'Expected an object with keyPoints and deliveryTips');

  const keyPoints = toStringList(data.keyPoints ?? data.key_points);
  const deliveryTips = toStringList(data.deliveryTips ?? data.delivery_tips);
  const defaults = fallbackKeyPoints();
  if (keyPoints.length === 0 && deliveryTips.length === 0) {
    return fallback(defaults, 'No keyPoints or deliveryTips in output');
  }

  // An empty list takes its single fallback bullet
  return parsed({
    keyPoints: keyPoints.length ? keyPoints : defaults.keyPoints,
    deliveryTips: deliveryTips.length ? deliveryTips : defaults.deliveryTips,
  });
};

// --- Follow-ups ---

export const parseFollowUps = (raw: string): ParseOutcome<FollowUpSuggestion[]> => {
  const extracted = tryExtract(raw);
  if (!extracted.ok) return fallback([], extracted.reason);

  const data = extracted.value;
  const list = Array.isArray(data) ? data : isRecord(data) ? (data.followUps ?? data.follow_ups) : undefined;
  if (!Array.isArray(list)) return fallback([], 'Expected a followUps array');

  const followUps = list.filter(isRecord).flatMap((item): FollowUpSuggestion[] =>
    typeof item.question === 'string' && item.question.trim()
      ? [{
          question: item.question.trim(),
          reason: typeof item.reason === 'string' ? item.reason : '',
          guidance: typeof item.guidance === 'string' ? item.guidance : '',
        }]
      : []
  );
  return parsed(followUps);
};

// --- Mock questions ---

export interface DraftMockQuestion {
  question: string;
  type: QuestionType;
  difficulty: Difficulty;
  themes: string[];
  expectedFramework: string;
}

const asDifficulty = (value: unknown, fallbackLevel: Difficulty): Difficulty => {
  if (typeof value !== 'string') return fallbackLevel;
  const lower = value.toLowerCase();
  return COACHING_POLICY.DIFFICULTY.LEVELS.find(level => level === lower) ?? fallbackLevel;
};

/**
 * Parses a generated batch of one question type. The requested type always
 * wins over whatever the model labelled the item as.
 */
export const parseMockQuestions = (
  raw: string,
  type: QuestionType,
  difficulty: Difficulty,
): ParseOutcome<DraftMockQuestion[]> => {
  const extracted = tryExtract(raw);
  if (!extracted.ok) return fallback([], extracted.reason);

  const data = extracted.value;
  const list = Array.isArray(data) ? data : isRecord(data) ? data.questions : undefined;
  if (!Array.isArray(list)) return fallback([], 'Expected a JSON array of questions');

  const questions = list.filter(isRecord).flatMap((item): DraftMockQuestion[] => {
    const text = typeof item.question === 'string' ? item.question.trim() : '';
    if (!text) return [];
    const framework = item.expectedFramework ?? item.expected_framework;
    return [{
      question: text,
      type,
      difficulty: asDifficulty(item.difficulty, difficulty),
      themes: toStringList(item.themes),
      expectedFramework: typeof framework === 'string' && framework.trim()
        ? framework.trim()
        : COACHING_POLICY.MOCK.FRAMEWORKS[type],
    }];
  });
  return parsed(questions);
};
