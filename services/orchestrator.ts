import { InterviewMode } from "../types";
import type { JobContext, MockQuestion, Session, SessionContext } from "../types";
import type { CoachingModel, CompanySearchProvider } from "./collaborators";
import type { CoachConfig } from "./config";
import { AuditLog } from "./auditLog";
import { CritiqueLoopController } from "./critiqueLoop";
import type { QuestionResult } from "./critiqueLoop";
import { isRecomputePoint, nextDifficulty, rollingAverage } from "./difficulty";
import { SessionPreconditionError } from "./errors";
import { FollowUpController } from "./followUp";
import type { FollowUpOutcome } from "./followUp";
import { MockInterviewGenerator } from "./mockInterview";
import type { MockInterviewPackage } from "./mockInterview";
import { ProfileRetriever, ProfileStore } from "./profile";
import type { PersonalityProfile } from "./profile";
import { ResearchCache } from "./researchCache";
import { SessionStateStore } from "./session";

export type OrchestratorSettings = Pick<
  CoachConfig,
  'maxIterations' | 'critiqueThreshold' | 'followUpDepth' | 'researchCacheDays' | 'mockQuestionCount' | 'difficultyWindow'
>;

export interface OrchestratorDeps {
  model: CoachingModel;
  search: CompanySearchProvider;
  settings: OrchestratorSettings;
  store?: SessionStateStore;
  profile?: ProfileStore;
  log?: AuditLog;
  now?: () => number;
  random?: () => number;
}

export interface MockQuestionTurn {
  question: MockQuestion;
  currentIndex: number; // 1-based position of `question`
  totalQuestions: number;
}

export interface MockAnswerResult extends QuestionResult {
  score: number;
  scoreIsFallback: boolean; // true when `score` is the neutral stand-in, not a real critique
  difficultyBefore: MockQuestion['difficulty'];
  difficultyAfter: MockQuestion['difficulty'];
}

export interface MockInterviewSummary {
  averageScore: number;
  questionsAnswered: number;
  questionsServed: number;
  totalQuestions: number;
  currentDifficulty: MockQuestion['difficulty'];
  difficultyProgression: MockQuestion['difficulty'][];
  scoresByQuestion: number[];
}

/**
 * Composes the controllers into the three workflows: preparation, practice
 * and the adaptive mock interview. Owns one session store; run one
 * orchestrator per client.
 */
export class InterviewOrchestrator {
  public readonly store: SessionStateStore;
  public readonly profile: ProfileStore;
  public readonly research: ResearchCache;
  public readonly log: AuditLog;

  private readonly loop: CritiqueLoopController;
  private readonly followUps: FollowUpController;
  private readonly mockGenerator: MockInterviewGenerator;
  private readonly settings: OrchestratorSettings;

  constructor(deps: OrchestratorDeps) {
    const now = deps.now ?? Date.now;
    this.settings = deps.settings;
    this.log = deps.log ?? new AuditLog();
    this.store = deps.store ?? new SessionStateStore({ log: this.log, now });
    this.profile = deps.profile ?? new ProfileStore(now);
    this.research = new ResearchCache(deps.search, { ttlDays: deps.settings.researchCacheDays, now, log: this.log });

    this.loop = new CritiqueLoopController(
      deps.model,
      new ProfileRetriever(this.profile, this.research),
      { maxIterations: deps.settings.maxIterations, critiqueThreshold: deps.settings.critiqueThreshold },
      { log: this.log, now },
    );
    this.followUps = new FollowUpController(this.loop, deps.settings.followUpDepth, this.log);
    this.mockGenerator = new MockInterviewGenerator(deps.model, this.research, {
      questionCount: deps.settings.mockQuestionCount,
      random: deps.random,
      log: this.log,
    });
  }

  // ============= SESSION MANAGEMENT =============

  public createSession(job: JobContext, mode: InterviewMode = InterviewMode.Practice): Session {
    return this.store.createSession(job, mode);
  }

  public getSessionContext(): SessionContext {
    return this.store.getContext();
  }

  public clearSession() {
    this.store.clearSession();
  }

  public exportSession(): Session | null {
    return this.store.exportSession();
  }

  public importSession(snapshot: Session) {
    this.store.importSession(snapshot);
  }

  // ============= PREPARATION MODE =============

  /**
   * Starts a fresh preparation session, researches the company and generates
   * the mock question sequence into it.
   */
  public async prepareMockInterview(
    companyName: string,
    position: string,
    jobDescription: string,
    forceRefresh = false,
  ): Promise<MockInterviewPackage> {
    this.store.createSession({ company: companyName, position, description: jobDescription }, InterviewMode.Preparation);

    const pkg = await this.mockGenerator.prepare(companyName, position, jobDescription, forceRefresh);

    this.store.addResearchData(pkg.researchData);
    this.store.addMockQuestions(pkg.questions);
    return pkg;
  }

  // ============= PRACTICE MODE =============

  /**
   * Answers a new top-level question. Resets follow-up depth, then records
   * the question, answer, critique and every iteration in the session.
   */
  public async practiceQuestion(text: string, useSessionContext = true): Promise<QuestionResult> {
    const session = this.store.current;
    const job = useSessionContext && session ? session.job : undefined;
    const mode = session?.mode === InterviewMode.MockInterview ? InterviewMode.MockInterview : InterviewMode.Practice;

    this.store.resetFollowUpDepth();

    const result = await this.loop.processQuestion({ text, mode, job });

    this.store.addQuestion(text);
    this.store.addAnswer(result.answer, result.critique);
    result.iterationHistory.forEach(record => this.store.addIteration(record));
    this.store.addToConversation('candidate', text);
    this.store.addToConversation('coach', result.answer);

    return result;
  }

  public practiceFollowUp(text: string): Promise<FollowUpOutcome> {
    return this.followUps.handle(this.store, text);
  }

  // ============= MOCK INTERVIEW MODE =============

  public startMockInterview(): MockQuestionTurn {
    const session = this.store.requireSession();
    if (session.mock.generatedQuestions.length === 0) {
      throw new SessionPreconditionError('NO_MOCK_QUESTIONS', "No mock questions available. Run prepareMockInterview first.");
    }

    this.store.setMode(InterviewMode.MockInterview);
    const turn = this.getNextMockQuestion();
    if (!turn) {
      throw new SessionPreconditionError('NO_MOCK_QUESTIONS', "All mock questions have already been served.");
    }
    return turn;
  }

  public getNextMockQuestion(): MockQuestionTurn | null {
    const question = this.store.getNextMockQuestion();
    const session = this.store.current;
    if (!question || !session) return null;

    return {
      question,
      currentIndex: session.mock.currentQuestionIndex,
      totalQuestions: session.mock.generatedQuestions.length,
    };
  }

  /**
   * Answers the question currently in play and records its overall score.
   * Every third score re-evaluates the difficulty.
   */
  public async answerMockQuestion(): Promise<MockAnswerResult> {
    this.store.requireSession();
    const current = this.store.getCurrentMockQuestion();
    if (!current) {
      throw new SessionPreconditionError('NO_CURRENT_QUESTION', "No current mock question. Call startMockInterview or getNextMockQuestion first.");
    }

    const result = await this.practiceQuestion(current.question, true);
    const score = result.critique.overall;
    const scoreIsFallback = result.critique.isFallback;
    this.store.recordMockScore(score);

    const session = this.store.requireSession();
    if (scoreIsFallback) {
      this.log.write('WARN', `Mock answer ${session.mock.performanceScores.length} scored with the neutral fallback (${result.critique.fallbackReason ?? 'no reason given'}).`);
    }
    const difficultyBefore = session.mock.difficulty;
    let difficultyAfter = difficultyBefore;

    if (isRecomputePoint(session.mock.performanceScores.length)) {
      const average = rollingAverage(session.mock.performanceScores, this.settings.difficultyWindow);
      difficultyAfter = nextDifficulty(difficultyBefore, average);
      if (difficultyAfter !== difficultyBefore) {
        this.store.setMockDifficulty(difficultyAfter);
        this.log.write('ADAPT', `Difficulty transitioning: ${difficultyBefore} -> ${difficultyAfter} (avg ${average.toFixed(1)}).`);
      } else {
        this.log.write('ADAPT', `Difficulty held at ${difficultyBefore} (avg ${average.toFixed(1)}).`);
      }
    }

    return { ...result, score, scoreIsFallback, difficultyBefore, difficultyAfter };
  }

  public getMockInterviewSummary(): MockInterviewSummary {
    const session = this.store.requireSession();
    const { mock } = session;

    return {
      averageScore: rollingAverage(mock.performanceScores, null),
      questionsAnswered: mock.performanceScores.length,
      questionsServed: mock.currentQuestionIndex,
      totalQuestions: mock.generatedQuestions.length,
      currentDifficulty: mock.difficulty,
      difficultyProgression: [...mock.difficultyHistory],
      scoresByQuestion: [...mock.performanceScores],
    };
  }

  // ============= PROFILE MANAGEMENT =============

  public addCV(cvText: string, tags: string[] = []) {
    this.profile.addCV(cvText, tags);
  }

  public addExperience(experience: string, tags: string[] = []) {
    this.profile.addExperience(experience, tags);
  }

  public addPersonality(profile: PersonalityProfile) {
    this.profile.addPersonality(profile);
  }
}
