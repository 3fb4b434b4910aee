import type {
  CritiqueResult,
  FollowUpSuggestion,
  InterviewMode,
  IterationRecord,
  JobContext,
  QAPair,
  Question,
} from "../types";
import type { CoachingModel, ContextRetriever, RetrievedContext } from "./collaborators";
import { COACHING_POLICY } from "./policy";
import { AuditLog } from "./auditLog";
import { describeError } from "./errors";
import { fallbackCritique, fallbackKeyPoints, parseCritique, parseFollowUps, parseKeyPoints } from "./parsing";

// ============================================================================
// CRITIQUE LOOP STATE MACHINE
// One question runs ANALYZE -> RETRIEVE -> GENERATE -> CRITIQUE, loops through
// ITERATE while the critique is below threshold and the bound allows, then
// REFINE -> EXTRACT -> PREDICT_FOLLOWUPS -> DONE. ERROR is reached only when
// no draft could ever be produced.
// ============================================================================

export type LoopState =
  | 'ANALYZE'
  | 'RETRIEVE'
  | 'GENERATE'
  | 'CRITIQUE'
  | 'ITERATE'
  | 'REFINE'
  | 'EXTRACT'
  | 'PREDICT_FOLLOWUPS'
  | 'DONE'
  | 'ERROR';

export type TerminalState = 'DONE' | 'ERROR';

export const LOOP_TRANSITIONS: Readonly<Record<LoopState, readonly LoopState[]>> = {
  ANALYZE: ['RETRIEVE'],
  RETRIEVE: ['GENERATE'],
  GENERATE: ['CRITIQUE', 'REFINE', 'ERROR'],
  CRITIQUE: ['ITERATE', 'REFINE'],
  ITERATE: ['GENERATE'],
  REFINE: ['EXTRACT'],
  EXTRACT: ['PREDICT_FOLLOWUPS'],
  PREDICT_FOLLOWUPS: ['DONE'],
  DONE: [],
  ERROR: [],
};

export interface LoopSettings {
  maxIterations: number;
  critiqueThreshold: number;
}

/** Threshold is exclusive: a score equal to it is good enough. */
export const shouldIterate = (overall: number, iterations: number, settings: LoopSettings): boolean =>
  overall < settings.critiqueThreshold && iterations < settings.maxIterations;

export const formatImprovementGuidance = (improvements: readonly string[]): string => {
  if (improvements.length === 0) return '';
  return [
    'IMPORTANT: Address the feedback from the previous iteration.',
    'Previous Feedback to Address:',
    ...improvements.map(i => `- ${i}`),
  ].join('\n');
};

export interface QuestionResult {
  question: string;
  answer: string;
  keyPoints: string[];
  deliveryTips: string[];
  followUps: FollowUpSuggestion[];
  critique: CritiqueResult;     // From the last completed iteration
  iterations: number;
  shouldIterate: boolean;
  iterationHistory: IterationRecord[];
  analysis: string;
  finalState: TerminalState;
  trace: LoopState[];
  error?: string;
}

export interface LoopOptions {
  log?: AuditLog;
  now?: () => number;
}

interface LoopRun {
  question: Question;
  previousExchange: QAPair | null;
  analysis: string;
  context: Readonly<RetrievedContext>;
  draft: string | null;
  iterations: number;
  critique: CritiqueResult | null;
  iterate: boolean;
  finalAnswer: string | null;
  keyPoints: string[];
  deliveryTips: string[];
  followUps: FollowUpSuggestion[];
  history: IterationRecord[];
  errors: string[];
  trace: LoopState[];
}

const EMPTY_CONTEXT: Readonly<RetrievedContext> = Object.freeze({
  cv: '',
  experience: '',
  personality: '',
  company: '',
  previousExchange: null,
});

export class CritiqueLoopController {
  private readonly log: AuditLog;
  private readonly now: () => number;

  constructor(
    private readonly model: CoachingModel,
    private readonly retriever: ContextRetriever,
    private readonly settings: LoopSettings,
    options: LoopOptions = {},
  ) {
    this.log = options.log ?? new AuditLog();
    this.now = options.now ?? Date.now;
  }

  /**
   * Runs one question through the state machine. Never rejects: collaborator
   * failures degrade to fallback content and are reported in `error`.
   */
  public async processQuestion(question: Question, opts: { previousExchange?: QAPair } = {}): Promise<QuestionResult> {
    const run: LoopRun = {
      question,
      previousExchange: opts.previousExchange ?? null,
      analysis: '',
      context: EMPTY_CONTEXT,
      draft: null,
      iterations: 0,
      critique: null,
      iterate: false,
      finalAnswer: null,
      keyPoints: [],
      deliveryTips: [],
      followUps: [],
      history: [],
      errors: [],
      trace: [],
    };

    this.log.write('LOOP', `Processing question: ${question.text.slice(0, 50)}`);

    let state: LoopState = 'ANALYZE';
    run.trace.push(state);
    while (state !== 'DONE' && state !== 'ERROR') {
      const next = await this.step(state, run);
      if (!LOOP_TRANSITIONS[state].includes(next)) {
        run.errors.push(`Illegal transition ${state} -> ${next}`);
        state = 'ERROR';
      } else {
        state = next;
      }
      run.trace.push(state);
    }

    return this.toResult(run, state === 'ERROR' ? 'ERROR' : 'DONE');
  }

  /**
   * Re-enters the loop for a follow-up. The original exchange rides along in
   * the retrieved context and the iteration counter starts from zero.
   */
  public processFollowUp(
    followUp: string,
    original: QAPair,
    context: { mode: InterviewMode; job?: JobContext },
  ): Promise<QuestionResult> {
    return this.processQuestion(
      { text: followUp, mode: context.mode, job: context.job },
      { previousExchange: original },
    );
  }

  private async step(state: LoopState, run: LoopRun): Promise<LoopState> {
    switch (state) {
      case 'ANALYZE': return this.analyze(run);
      case 'RETRIEVE': return this.retrieve(run);
      case 'GENERATE': return this.generate(run);
      case 'CRITIQUE': return this.critique(run);
      case 'ITERATE':
        this.log.write('LOOP', `Iterating (score below ${this.settings.critiqueThreshold}).`);
        return 'GENERATE';
      case 'REFINE': return this.refine(run);
      case 'EXTRACT': return this.extract(run);
      case 'PREDICT_FOLLOWUPS': return this.predictFollowUps(run);
      case 'DONE':
      case 'ERROR':
        return state;
    }
  }

  private fail(run: LoopRun, label: string, error: unknown) {
    const message = `${label}: ${describeError(error)}`;
    run.errors.push(message);
    console.warn(`Critique loop ${label} failed:`, error);
    this.log.write('WARN', message);
  }

  private async analyze(run: LoopRun): Promise<LoopState> {
    try {
      run.analysis = await this.model.analyzeQuestion(run.question.text, run.question.job?.description ?? '');
    } catch (error) {
      this.fail(run, 'analysis', error);
    }
    return 'RETRIEVE';
  }

  private async retrieve(run: LoopRun): Promise<LoopState> {
    const text = run.question.text;
    const company = run.question.job?.company.trim() ?? '';

    const attempt = async (label: string, fn: () => Promise<string>): Promise<string> => {
      try {
        return await fn();
      } catch (error) {
        this.fail(run, label, error);
        return '';
      }
    };

    run.context = Object.freeze({
      cv: await attempt('cv retrieval', () => this.retriever.retrieveCV(text)),
      experience: await attempt('experience retrieval', () => this.retriever.retrieveExperience(text)),
      personality: await attempt('personality retrieval', () => this.retriever.retrievePersonality()),
      company: company ? await attempt('company retrieval', () => this.retriever.retrieveCompanyResearch(company)) : '',
      previousExchange: run.previousExchange ? Object.freeze({ ...run.previousExchange }) : null,
    });
    return 'GENERATE';
  }

  private async generate(run: LoopRun): Promise<LoopState> {
    const guidance = run.iterations > 0 && run.critique ? formatImprovementGuidance(run.critique.improvements) : '';

    try {
      const draft = await this.model.generateAnswer({
        question: run.question.text,
        analysis: run.analysis,
        context: run.context,
        iteration: run.iterations + 1,
        guidance,
      });
      if (!draft.trim()) throw new Error("Empty response");

      run.iterations++;
      run.draft = draft;
      this.log.write('LOOP', `Generated draft ${run.iterations}.`);
      return 'CRITIQUE';
    } catch (error) {
      this.fail(run, 'generation', error);
      run.iterate = false;
      return run.draft ? 'REFINE' : 'ERROR';
    }
  }

  private async critique(run: LoopRun): Promise<LoopState> {
    const answer = run.draft ?? '';
    let critique: CritiqueResult;

    try {
      const raw = await this.model.critiqueAnswer(run.question.text, answer, run.context.cv);
      const outcome = parseCritique(raw);
      if (outcome.kind === 'fallback') {
        console.warn("Critique parse failed:", outcome.reason);
        this.log.write('WARN', `Critique unparseable, using neutral scores (${outcome.reason}).`);
      }
      critique = outcome.value;
    } catch (error) {
      this.fail(run, 'critique', error);
      critique = fallbackCritique(describeError(error));
    }

    if (run.context.company) {
      try {
        critique = { ...critique, alignment: await this.model.checkCompanyAlignment(answer, run.context.company) };
      } catch (error) {
        this.fail(run, 'alignment', error);
      }
    }

    run.critique = critique;
    run.iterate = shouldIterate(critique.overall, run.iterations, this.settings);
    run.history.push({ iteration: run.iterations, score: critique.overall, timestamp: this.now() });

    this.log.write('SCORE', `Iteration ${run.iterations}: ${critique.overall}/10 | Iterate: ${run.iterate}`);
    return run.iterate ? 'ITERATE' : 'REFINE';
  }

  private async refine(run: LoopRun): Promise<LoopState> {
    const draft = run.draft ?? '';
    try {
      const refined = await this.model.refineAnswer(draft, run.critique?.strengths ?? []);
      run.finalAnswer = refined.trim() ? refined : draft;
    } catch (error) {
      this.fail(run, 'refinement', error);
      run.finalAnswer = draft;
    }
    return 'EXTRACT';
  }

  private async extract(run: LoopRun): Promise<LoopState> {
    try {
      const outcome = parseKeyPoints(await this.model.extractKeyPoints(run.question.text, run.finalAnswer ?? ''));
      if (outcome.kind === 'fallback') {
        this.log.write('WARN', `Key points unparseable (${outcome.reason}).`);
      }
      run.keyPoints = outcome.value.keyPoints;
      run.deliveryTips = outcome.value.deliveryTips;
    } catch (error) {
      this.fail(run, 'extraction', error);
      const fallbackPoints = fallbackKeyPoints();
      run.keyPoints = fallbackPoints.keyPoints;
      run.deliveryTips = fallbackPoints.deliveryTips;
    }
    return 'PREDICT_FOLLOWUPS';
  }

  private async predictFollowUps(run: LoopRun): Promise<LoopState> {
    try {
      const outcome = parseFollowUps(await this.model.predictFollowUps(run.question.text, run.finalAnswer ?? ''));
      if (outcome.kind === 'fallback') {
        this.log.write('WARN', `Follow-ups unparseable (${outcome.reason}).`);
      }
      run.followUps = outcome.value;
    } catch (error) {
      this.fail(run, 'follow-up prediction', error);
      run.followUps = [];
    }
    return 'DONE';
  }

  private toResult(run: LoopRun, finalState: TerminalState): QuestionResult {
    const errorText = run.errors.length ? run.errors.join('; ') : undefined;

    if (finalState === 'ERROR') {
      const fallbackPoints = fallbackKeyPoints();
      this.log.write('LOOP', `Question failed after ${run.iterations} iterations.`);
      return {
        question: run.question.text,
        answer: run.finalAnswer ?? run.draft ?? COACHING_POLICY.GENERATION.PLACEHOLDER_ANSWER,
        keyPoints: fallbackPoints.keyPoints,
        deliveryTips: fallbackPoints.deliveryTips,
        followUps: [],
        critique: run.critique ?? fallbackCritique('No answer was generated'),
        iterations: run.iterations,
        shouldIterate: false,
        iterationHistory: run.history,
        analysis: run.analysis,
        finalState,
        trace: run.trace,
        error: errorText ?? 'Question processing failed',
      };
    }

    const critique = run.critique ?? fallbackCritique('Answer was never critiqued');
    this.log.write('LOOP', `Question processed. Iterations: ${run.iterations} | Final score: ${critique.overall}/10`);
    return {
      question: run.question.text,
      answer: run.finalAnswer ?? run.draft ?? '',
      keyPoints: run.keyPoints,
      deliveryTips: run.deliveryTips,
      followUps: run.followUps,
      critique,
      iterations: run.iterations,
      shouldIterate: run.iterate,
      iterationHistory: run.history,
      analysis: run.analysis,
      finalState,
      trace: run.trace,
      ...(errorText ? { error: errorText } : {}),
    };
  }
}
