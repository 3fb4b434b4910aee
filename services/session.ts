import { randomUUID } from 'crypto';
import { InterviewMode } from "../types";
import type {
  ConversationEntry,
  CritiqueResult,
  Difficulty,
  IterationRecord,
  JobContext,
  MockQuestion,
  ResearchData,
  Session,
  SessionContext,
} from "../types";
import { COACHING_POLICY } from "./policy";
import { AuditLog } from "./auditLog";
import { SessionPreconditionError } from "./errors";

export interface PerformanceSummary {
  averageScore: number;
  questionCount: number;
  followUpCount: number;
  latestCritiques: CritiqueResult[];
}

export interface SessionStoreOptions {
  log?: AuditLog;
  now?: () => number;
}

/**
 * Holds at most one live session. Mutators are no-ops without a session;
 * reads that need one throw SessionPreconditionError.
 *
 * Access is expected to be serialized by the caller: one store per client.
 */
export class SessionStateStore {
  private session: Session | null = null;
  private subscribers: ((session: Session | null) => void)[] = [];
  private readonly log: AuditLog;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.log = options.log ?? new AuditLog();
    this.now = options.now ?? Date.now;
  }

  // --- State Access ---
  // Callers only ever see copies; the live session changes through the mutators below.

  public get current(): Session | null { return this.exportSession(); }

  public hasSession(): boolean { return this.session !== null; }

  public requireSession(): Session {
    return structuredClone(this.live());
  }

  private live(): Session {
    if (!this.session) {
      throw new SessionPreconditionError('NO_ACTIVE_SESSION', "No active session. Create a session first.");
    }
    return this.session;
  }

  public subscribe(cb: (session: Session | null) => void) {
    this.subscribers.push(cb);
    return () => { this.subscribers = this.subscribers.filter(s => s !== cb); };
  }

  private notify() {
    if (this.subscribers.length === 0) return;
    const snapshot = this.exportSession();
    this.subscribers.forEach(cb => cb(snapshot));
  }

  /** Applies a mutation to the live session, or does nothing without one. */
  private mutate(fn: (session: Session) => void) {
    if (!this.session) return;
    fn(this.session);
    this.session.updatedAt = this.now();
    this.notify();
  }

  // --- Lifecycle ---

  public createSession(job: JobContext, mode: InterviewMode = InterviewMode.Practice, keyRequirements: string[] = []): Session {
    const now = this.now();
    this.session = {
      id: randomUUID(),
      mode,
      job: { ...job },
      keyRequirements: [...keyRequirements],
      researchData: null,
      practice: {
        questionsAsked: [],
        answersGiven: [],
        critiques: [],
        followUpsAsked: [],
        followUpAnswers: [],
        iterationHistory: [],
      },
      mock: {
        generatedQuestions: [],
        currentQuestionIndex: 0,
        performanceScores: [],
        difficulty: COACHING_POLICY.DIFFICULTY.INITIAL,
        difficultyHistory: [COACHING_POLICY.DIFFICULTY.INITIAL],
      },
      conversation: [],
      currentQuestion: null,
      currentAnswer: null,
      followUpDepth: 0,
      awaitingFollowUp: false,
      createdAt: now,
      updatedAt: now,
    };
    this.log.write('STATE', `Created new ${mode} session for ${job.company || 'unspecified company'} - ${job.position || 'unspecified position'}.`);
    this.notify();
    return structuredClone(this.session);
  }

  public clearSession() {
    this.session = null;
    this.log.write('STATE', 'Session cleared.');
    this.notify();
  }

  /** Deep, plain copy of the live session, or null without one. */
  public exportSession(): Session | null {
    return this.session ? structuredClone(this.session) : null;
  }

  public importSession(snapshot: Session) {
    this.session = structuredClone(snapshot);
    this.log.write('STATE', `Imported session ${snapshot.id}.`);
    this.notify();
  }

  // --- Mutators ---

  public setMode(mode: InterviewMode) {
    this.mutate(s => {
      s.mode = mode;
      this.log.write('STATE', `Mode set to ${mode}.`);
    });
  }

  public addResearchData(researchData: ResearchData) {
    this.mutate(s => { s.researchData = structuredClone(researchData); });
  }

  /** Sets the question sequence. Refused once the cursor has moved, so the index never rewinds. */
  public addMockQuestions(questions: MockQuestion[]) {
    this.mutate(s => {
      if (s.mock.currentQuestionIndex > 0) {
        this.log.write('WARN', 'Mock interview already in progress; question set left unchanged.');
        return;
      }
      s.mock.generatedQuestions = structuredClone(questions);
    });
  }

  public addQuestion(question: string) {
    this.mutate(s => {
      s.practice.questionsAsked.push(question);
      s.currentQuestion = question;
    });
  }

  public addAnswer(answer: string, critique?: CritiqueResult) {
    this.mutate(s => {
      s.practice.answersGiven.push(answer);
      s.currentAnswer = answer;
      if (critique) s.practice.critiques.push(structuredClone(critique));
    });
  }

  public addIteration(record: IterationRecord) {
    this.mutate(s => { s.practice.iterationHistory.push({ ...record }); });
  }

  /** Opens a follow-up: depth grows by one and the answer is awaited. */
  public addFollowUp(question: string) {
    this.mutate(s => {
      s.practice.followUpsAsked.push(question);
      s.followUpDepth += 1;
      s.awaitingFollowUp = true;
    });
  }

  public addFollowUpAnswer(answer: string) {
    this.mutate(s => {
      s.practice.followUpAnswers.push(answer);
      s.awaitingFollowUp = false;
    });
  }

  public resetFollowUpDepth() {
    this.mutate(s => {
      s.followUpDepth = 0;
      s.awaitingFollowUp = false;
    });
  }

  public addToConversation(role: ConversationEntry['role'], content: string) {
    this.mutate(s => { s.conversation.push({ role, content, timestamp: this.now() }); });
  }

  public recordMockScore(score: number) {
    this.mutate(s => { s.mock.performanceScores.push(score); });
  }

  public setMockDifficulty(difficulty: Difficulty) {
    this.mutate(s => {
      s.mock.difficulty = difficulty;
      s.mock.difficultyHistory.push(difficulty);
    });
  }

  // --- Mock question cursor ---

  /** Hands out the question at the cursor, then advances it. Null once exhausted. */
  public getNextMockQuestion(): MockQuestion | null {
    const s = this.session;
    if (!s) return null;

    const mock = s.mock;
    if (mock.currentQuestionIndex >= mock.generatedQuestions.length) return null;

    const question = mock.generatedQuestions[mock.currentQuestionIndex];
    mock.currentQuestionIndex += 1;
    s.updatedAt = this.now();
    this.notify();
    return structuredClone(question);
  }

  /** The question most recently handed out, if any. */
  public getCurrentMockQuestion(): MockQuestion | null {
    const mock = this.session?.mock;
    if (!mock || mock.currentQuestionIndex === 0) return null;
    const question = mock.generatedQuestions[mock.currentQuestionIndex - 1];
    return question ? structuredClone(question) : null;
  }

  // --- Reads ---

  public getContext(): SessionContext {
    const s = this.live();
    return structuredClone({
      job: s.job,
      keyRequirements: s.keyRequirements,
      researchData: s.researchData,
      mode: s.mode,
      conversation: s.conversation.slice(-COACHING_POLICY.SESSION.CONTEXT_WINDOW),
      followUpDepth: s.followUpDepth,
      awaitingFollowUp: s.awaitingFollowUp,
    });
  }

  public getPerformanceSummary(): PerformanceSummary {
    const s = this.live();
    const critiques = s.practice.critiques;
    const averageScore = critiques.length
      ? critiques.reduce((sum, c) => sum + c.overall, 0) / critiques.length
      : 0;

    return {
      averageScore,
      questionCount: s.practice.questionsAsked.length,
      followUpCount: s.practice.followUpsAsked.length,
      latestCritiques: structuredClone(critiques.slice(-COACHING_POLICY.SESSION.RECENT_CRITIQUES)),
    };
  }
}
