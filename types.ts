export enum Difficulty {
  Easy = 'easy',
  Medium = 'medium',
  Hard = 'hard',
}

export enum InterviewMode {
  Preparation = 'preparation',
  Practice = 'practice',
  MockInterview = 'mock_interview',
}

export type QuestionType = 'behavioral' | 'technical' | 'situational';

export interface JobContext {
  company: string;
  position: string;
  description: string;
}

export interface Question {
  readonly text: string;
  readonly mode: InterviewMode;
  readonly job?: Readonly<JobContext>;
}

export interface QAPair {
  question: string;
  answer: string;
}

export const CRITIQUE_DIMENSIONS = [
  'authenticity',
  'relevance',
  'structure',
  'specificity',
  'impact',
  'length',
] as const;

export type CritiqueDimension = typeof CRITIQUE_DIMENSIONS[number];

export interface CritiqueResult {
  scores: Record<CritiqueDimension, number>; // 0-10 each
  overall: number; // 0-10
  strengths: string[];
  improvements: string[];
  factCheck?: string;
  alignment?: string; // Only when company research was available
  isFallback: boolean; // True if the neutral fallback replaced an unparseable critique
  fallbackReason?: string;
}

export interface IterationRecord {
  iteration: number;
  score: number;
  timestamp: number;
}

export interface FollowUpSuggestion {
  question: string;
  reason: string;
  guidance: string;
}

export interface MockQuestion {
  id: string;
  question: string;
  type: QuestionType;
  difficulty: Difficulty;
  themes: string[];
  expectedFramework: string;
}

export type ResearchField = 'overview' | 'culture' | 'news' | 'positionAnalysis';

export const RESEARCH_FIELDS: readonly ResearchField[] = ['overview', 'culture', 'news', 'positionAnalysis'];

export interface SearchSummary {
  summary: string;
  sources: string[];
}

export interface ResearchData {
  companyName: string;
  position: string;
  overview: string;
  culture: string;
  news: string;
  positionAnalysis: string;
  sources: Record<ResearchField, string[]>;
  researchedAt: number | null;
}

export interface ConversationEntry {
  role: 'candidate' | 'coach';
  content: string;
  timestamp: number;
}

export interface PracticeSubstate {
  questionsAsked: string[];
  answersGiven: string[];
  critiques: CritiqueResult[];
  followUpsAsked: string[];
  followUpAnswers: string[];
  iterationHistory: IterationRecord[];
}

export interface MockSubstate {
  generatedQuestions: MockQuestion[];
  currentQuestionIndex: number;
  performanceScores: number[];
  difficulty: Difficulty;
  difficultyHistory: Difficulty[];
}

export interface Session {
  id: string;
  mode: InterviewMode;
  job: JobContext;
  keyRequirements: string[];
  researchData: ResearchData | null;
  practice: PracticeSubstate;
  mock: MockSubstate;
  conversation: ConversationEntry[];
  currentQuestion: string | null;
  currentAnswer: string | null;
  followUpDepth: number;
  awaitingFollowUp: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface SessionContext {
  job: JobContext;
  keyRequirements: string[];
  researchData: ResearchData | null;
  mode: InterviewMode;
  conversation: ConversationEntry[];
  followUpDepth: number;
  awaitingFollowUp: boolean;
}
