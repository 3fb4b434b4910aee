export * from "./types";
export { COACHING_POLICY, DAY_MS } from "./services/policy";
export { AuditLog } from "./services/auditLog";
export type { LogTag } from "./services/auditLog";
export { ConfigError, SessionPreconditionError, describeError } from "./services/errors";
export type { PreconditionCode } from "./services/errors";
export { loadConfig } from "./services/config";
export type { CoachConfig } from "./services/config";
export type {
  AnswerBrief,
  CoachingModel,
  CompanySearchProvider,
  ContextRetriever,
  MockQuestionRequest,
  RetrievedContext,
} from "./services/collaborators";
export { isRecomputePoint, nextDifficulty, rollingAverage } from "./services/difficulty";
export { CritiqueLoopController, LOOP_TRANSITIONS, formatImprovementGuidance, shouldIterate } from "./services/critiqueLoop";
export type { LoopSettings, LoopState, QuestionResult, TerminalState } from "./services/critiqueLoop";
export { SessionStateStore } from "./services/session";
export type { PerformanceSummary } from "./services/session";
export { ResearchCache } from "./services/researchCache";
export type { CachedField, CachedResearch, ResearchLookup } from "./services/researchCache";
export { FollowUpController } from "./services/followUp";
export type { FollowUpOutcome } from "./services/followUp";
export { MockInterviewGenerator, questionMix } from "./services/mockInterview";
export type { MockInterviewPackage } from "./services/mockInterview";
export { ProfileRetriever, ProfileStore, chunkText } from "./services/profile";
export type { PersonalityProfile } from "./services/profile";
export { InterviewOrchestrator } from "./services/orchestrator";
export type { MockAnswerResult, MockInterviewSummary, MockQuestionTurn, OrchestratorSettings } from "./services/orchestrator";
export { GeminiCoach } from "./services/gemini";
export type { ModelClient } from "./services/gemini";
export { GeminiSearch } from "./services/research";
export { createCoach } from "./services/bootstrap";
