import type { Difficulty, QAPair, QuestionType, SearchSummary } from "../types";

// ============================================================================
// EXTERNAL COLLABORATORS
// The core only ever talks to these interfaces. Every method may reject; the
// core decides what a failure means at each call site and never retries.
// ============================================================================

export interface RetrievedContext {
  cv: string;
  experience: string;
  personality: string;
  company: string;
  previousExchange: QAPair | null;
}

export interface AnswerBrief {
  question: string;
  analysis: string;
  context: Readonly<RetrievedContext>;
  iteration: number; // 1-based number of the draft being produced
  guidance: string;  // Corrective guidance from the previous critique, '' on the first draft
}

export interface MockQuestionRequest {
  type: QuestionType;
  count: number;
  companyName: string;
  position: string;
  jobDescription: string;
  companyResearch: string;
  difficulty: Difficulty;
}

/**
 * Text-in/text-out model operations. Structured operations return the raw
 * model text; parsing and fallbacks belong to the caller.
 */
export interface CoachingModel {
  analyzeQuestion(question: string, jobContext: string): Promise<string>;
  generateAnswer(brief: AnswerBrief): Promise<string>;
  critiqueAnswer(question: string, answer: string, cvContext: string): Promise<string>;
  checkCompanyAlignment(answer: string, companyResearch: string): Promise<string>;
  refineAnswer(answer: string, strengths: string[]): Promise<string>;
  extractKeyPoints(question: string, answer: string): Promise<string>;
  predictFollowUps(question: string, answer: string): Promise<string>;
  generateMockQuestions(request: MockQuestionRequest): Promise<string>;
}

export interface ContextRetriever {
  retrieveCV(query: string): Promise<string>;
  retrieveExperience(query: string): Promise<string>;
  retrievePersonality(): Promise<string>;
  retrieveCompanyResearch(company: string): Promise<string>;
}

export interface CompanySearchProvider {
  searchCompanyOverview(company: string): Promise<SearchSummary>;
  searchCompanyCulture(company: string): Promise<SearchSummary>;
  searchRecentNews(company: string, days: number): Promise<SearchSummary>;
  searchPositionInsights(company: string, position: string): Promise<SearchSummary>;
}
