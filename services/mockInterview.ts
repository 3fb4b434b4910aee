import { randomUUID } from 'crypto';
import { Difficulty } from "../types";
import type { MockQuestion, QuestionType, ResearchData } from "../types";
import type { CoachingModel, MockQuestionRequest } from "./collaborators";
import type { ResearchCache } from "./researchCache";
import { COACHING_POLICY } from "./policy";
import { AuditLog } from "./auditLog";
import { describeError } from "./errors";
import { parseMockQuestions } from "./parsing";
import type { DraftMockQuestion } from "./parsing";

// --- Fallback Registry ---
// Used for a question type when the model is unreachable or its output is unusable

const FallbackRegistry: Record<QuestionType, { question: string; themes: string[] }[]> = {
  behavioral: [
    { question: "Tell me about a time you had to deliver under a tight deadline.", themes: ["prioritization", "pressure"] },
    { question: "Describe a situation where you disagreed with a teammate and how you resolved it.", themes: ["conflict", "collaboration"] },
    { question: "Tell me about a mistake you made and what you learned from it.", themes: ["ownership", "growth"] },
  ],
  technical: [
    { question: "Walk me through the architecture of a system you built and the trade-offs you made.", themes: ["system design", "trade-offs"] },
    { question: "How do you approach debugging an issue you cannot reproduce locally?", themes: ["debugging", "observability"] },
    { question: "How do you decide what to test and at which level?", themes: ["testing", "quality"] },
  ],
  situational: [
    { question: "What would you do if a key stakeholder changed requirements a week before launch?", themes: ["stakeholders", "scope"] },
    { question: "How would you handle inheriting a codebase with no documentation?", themes: ["onboarding", "ambiguity"] },
    { question: "What would you do if you noticed a colleague's work had a serious flaw?", themes: ["candor", "teamwork"] },
  ],
};

export type TypeDistribution = Record<QuestionType, number>;
export type DifficultyDistribution = Record<Difficulty, number>;

export interface MockInterviewPackage {
  companyName: string;
  position: string;
  jobDescription: string;
  researchData: ResearchData;
  questions: MockQuestion[];
  totalQuestions: number;
  difficultyDistribution: DifficultyDistribution;
  typeDistribution: TypeDistribution;
  error?: string;
}

export interface MockInterviewOptions {
  questionCount?: number;
  random?: () => number;
  log?: AuditLog;
}

/** 40% behavioral, 40% technical, situational takes the rest. */
export const questionMix = (count: number): TypeDistribution => {
  const { MIX } = COACHING_POLICY.MOCK;
  const behavioral = Math.floor(count * MIX.behavioral);
  const technical = Math.floor(count * MIX.technical);
  return { behavioral, technical, situational: count - behavioral - technical };
};

export const getDifficultyDistribution = (questions: readonly MockQuestion[]): DifficultyDistribution => {
  const distribution: DifficultyDistribution = { [Difficulty.Easy]: 0, [Difficulty.Medium]: 0, [Difficulty.Hard]: 0 };
  questions.forEach(q => { distribution[q.difficulty] += 1; });
  return distribution;
};

export const getTypeDistribution = (questions: readonly MockQuestion[]): TypeDistribution => {
  const distribution: TypeDistribution = { behavioral: 0, technical: 0, situational: 0 };
  questions.forEach(q => { distribution[q.type] += 1; });
  return distribution;
};

export class MockInterviewGenerator {
  private readonly questionCount: number;
  private readonly random: () => number;
  private readonly log: AuditLog;

  constructor(
    private readonly model: CoachingModel,
    private readonly research: ResearchCache,
    options: MockInterviewOptions = {},
  ) {
    this.questionCount = options.questionCount ?? COACHING_POLICY.MOCK.QUESTION_COUNT;
    this.random = options.random ?? Math.random;
    this.log = options.log ?? new AuditLog();
  }

  /**
   * Researches the company (cached unless `forceRefresh`) and generates one
   * preparation cycle's question sequence.
   */
  public async prepare(
    companyName: string,
    position: string,
    jobDescription: string,
    forceRefresh = false,
    difficulty: Difficulty = COACHING_POLICY.DIFFICULTY.INITIAL,
  ): Promise<MockInterviewPackage> {
    this.log.write('MOCK', `Preparing mock interview: ${companyName} / ${position}.`);

    const lookup = await this.research.getOrFetch(companyName, position, forceRefresh);
    const errors = lookup.error ? [`research: ${lookup.error}`] : [];

    const limit = COACHING_POLICY.RESEARCH.CONTEXT_CHARS;
    const companyResearch = [
      `Overview: ${lookup.data.overview}`,
      `Culture: ${lookup.data.culture}`,
      `Recent News: ${lookup.data.news}`,
    ].join('\n');

    const mix = questionMix(this.questionCount);
    const questions: MockQuestion[] = [];
    const types: QuestionType[] = ['behavioral', 'technical', 'situational'];

    for (const type of types) {
      if (mix[type] === 0) continue;
      const batch = await this.generateBatch({
        type,
        count: mix[type],
        companyName,
        position,
        jobDescription: jobDescription.slice(0, limit),
        companyResearch: companyResearch.slice(0, limit),
        difficulty,
      }, errors);
      questions.push(...batch.map(q => ({ ...q, id: randomUUID() })));
    }

    const shuffled = this.shuffle(questions);
    const typeDistribution = getTypeDistribution(shuffled);
    this.log.write('MOCK', `Mock interview ready: ${shuffled.length} questions (B ${typeDistribution.behavioral} / T ${typeDistribution.technical} / S ${typeDistribution.situational}).`);

    return {
      companyName,
      position,
      jobDescription,
      researchData: lookup.data,
      questions: shuffled,
      totalQuestions: shuffled.length,
      difficultyDistribution: getDifficultyDistribution(shuffled),
      typeDistribution,
      ...(errors.length ? { error: errors.join('; ') } : {}),
    };
  }

  private async generateBatch(
    request: MockQuestionRequest,
    errors: string[],
  ): Promise<DraftMockQuestion[]> {
    const { type, count, difficulty } = request;
    try {
      const outcome = parseMockQuestions(await this.model.generateMockQuestions(request), type, difficulty);
      if (outcome.kind === 'parsed' && outcome.value.length > 0) return outcome.value.slice(0, count);
      const reason = outcome.kind === 'fallback' ? outcome.reason : 'No questions returned';
      console.warn(`Mock ${type} question generation unusable:`, reason);
      this.log.write('WARN', `Using fallback ${type} questions (${reason}).`);
    } catch (error) {
      console.warn(`Mock ${type} question generation failed:`, error);
      errors.push(`${type} questions: ${describeError(error)}`);
      this.log.write('WARN', `Using fallback ${type} questions (${describeError(error)}).`);
    }
    return this.fallbackBatch(type, count, difficulty);
  }

  private fallbackBatch(type: QuestionType, count: number, difficulty: Difficulty): DraftMockQuestion[] {
    const pool = FallbackRegistry[type];
    return Array.from({ length: count }, (_, i) => {
      const item = pool[i % pool.length];
      return {
        question: item.question,
        type,
        difficulty,
        themes: [...item.themes],
        expectedFramework: COACHING_POLICY.MOCK.FRAMEWORKS[type],
      };
    });
  }

  /** Fisher-Yates over a copy, driven by the injected random source. */
  private shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }
}
