import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Difficulty, InterviewMode } from '../types';
import { AuditLog } from './auditLog';
import { InterviewOrchestrator } from './orchestrator';
import type { MockAnswerResult, OrchestratorSettings } from './orchestrator';
import { FakeSearch, ScriptedModel, critiqueJson } from './testing/fakes';

const T0 = Date.UTC(2026, 0, 1);
const job = { company: 'Acme', position: 'Engineer', description: 'Build APIs' };

const baseSettings: OrchestratorSettings = {
  maxIterations: 3,
  critiqueThreshold: 7,
  followUpDepth: 3,
  researchCacheDays: 7,
  mockQuestionCount: 6,
  difficultyWindow: null,
};

const build = (model: ScriptedModel, settings: Partial<OrchestratorSettings> = {}) =>
  new InterviewOrchestrator({
    model,
    search: new FakeSearch(),
    settings: { ...baseSettings, ...settings },
    log: new AuditLog(200, () => new Date('2026-01-01T00:00:00.000Z')),
    now: () => T0,
    random: () => 0.999,
  });

const runMockInterview = async (coach: InterviewOrchestrator, answers: number): Promise<MockAnswerResult[]> => {
  await coach.prepareMockInterview('Acme', 'Engineer', 'Build APIs');
  coach.startMockInterview();
  const results: MockAnswerResult[] = [];
  for (let i = 0; i < answers; i++) {
    if (i > 0) coach.getNextMockQuestion();
    results.push(await coach.answerMockQuestion());
  }
  return results;
};

describe('InterviewOrchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  describe('practice', () => {
    it('records the question, answer, critique and iterations', async () => {
      const coach = build(new ScriptedModel());
      coach.createSession(job);

      const result = await coach.practiceQuestion('Why Acme?');

      const session = coach.store.requireSession();
      expect(session.practice.questionsAsked).toEqual(['Why Acme?']);
      expect(session.practice.answersGiven).toEqual([result.answer]);
      expect(session.practice.critiques.map(c => c.overall)).toEqual([8]);
      expect(session.practice.iterationHistory).toEqual([{ iteration: 1, score: 8, timestamp: T0 }]);
      expect(session.conversation.map(e => [e.role, e.content])).toEqual([
        ['candidate', 'Why Acme?'],
        ['coach', 'Refined: Draft 1'],
      ]);
    });

    it('works without a session', async () => {
      const coach = build(new ScriptedModel());
      const result = await coach.practiceQuestion('Why Acme?');

      expect(result.finalState).toBe('DONE');
      expect(coach.store.current).toBeNull();
    });

    it('resets follow-up depth on every new question', async () => {
      const coach = build(new ScriptedModel());
      coach.createSession(job);
      await coach.practiceQuestion('Why Acme?');

      const followUp = await coach.practiceFollowUp('What drew you to payments?');
      expect(followUp).toMatchObject({ status: 'ANSWERED', depth: 1 });
      expect(coach.getSessionContext().followUpDepth).toBe(1);

      await coach.practiceQuestion('Describe a conflict');
      expect(coach.getSessionContext().followUpDepth).toBe(0);
    });
  });

  describe('mock interview', () => {
    it('prepares questions and research into a preparation session', async () => {
      const coach = build(new ScriptedModel());
      const pkg = await coach.prepareMockInterview('Acme', 'Engineer', 'Build APIs');

      const session = coach.store.requireSession();
      expect(session.mode).toBe(InterviewMode.Preparation);
      expect(session.mock.generatedQuestions).toHaveLength(6);
      expect(session.researchData?.overview).toBe('overview of Acme');
      expect(pkg.typeDistribution).toEqual({ behavioral: 2, technical: 2, situational: 2 });
    });

    it('starts with the first question in mock mode', async () => {
      const coach = build(new ScriptedModel());
      await coach.prepareMockInterview('Acme', 'Engineer', 'Build APIs');

      const turn = coach.startMockInterview();
      expect(turn.question.question).toBe('behavioral question 1');
      expect(turn.currentIndex).toBe(1);
      expect(turn.totalQuestions).toBe(6);
      expect(coach.store.requireSession().mode).toBe(InterviewMode.MockInterview);
    });

    it('refuses to start without questions', () => {
      const coach = build(new ScriptedModel());
      coach.createSession(job);
      expect(() => coach.startMockInterview()).toThrow('No mock questions available. Run prepareMockInterview first.');
    });

    it('refuses to answer before a question is served', async () => {
      const coach = build(new ScriptedModel());
      coach.createSession(job);
      await expect(coach.answerMockQuestion()).rejects.toMatchObject({ code: 'NO_CURRENT_QUESTION' });
    });

    it('re-evaluates difficulty on every third score', async () => {
      const model = new ScriptedModel({
        critiqueAnswer: [9, 9, 9, 7, 7, 7].map(score => critiqueJson(score)),
      });
      const coach = build(model);

      const results = await runMockInterview(coach, 6);

      expect(results.map(r => [r.difficultyBefore, r.difficultyAfter])).toEqual([
        [Difficulty.Medium, Difficulty.Medium],
        [Difficulty.Medium, Difficulty.Medium],
        [Difficulty.Medium, Difficulty.Hard],
        [Difficulty.Hard, Difficulty.Hard],
        [Difficulty.Hard, Difficulty.Hard],
        [Difficulty.Hard, Difficulty.Hard],
      ]);
      expect(coach.getMockInterviewSummary()).toEqual({
        averageScore: 8,
        questionsAnswered: 6,
        questionsServed: 6,
        totalQuestions: 6,
        currentDifficulty: Difficulty.Hard,
        difficultyProgression: [Difficulty.Medium, Difficulty.Hard],
        scoresByQuestion: [9, 9, 9, 7, 7, 7],
      });
      expect(coach.log.entries().filter(e => e.includes('[ADAPT]'))).toEqual([
        '[2026-01-01T00:00:00.000Z] [ADAPT] Difficulty held at hard (avg 8.0).',
        '[2026-01-01T00:00:00.000Z] [ADAPT] Difficulty transitioning: medium -> hard (avg 9.0).',
      ]);
      expect(coach.getNextMockQuestion()).toBeNull();
    });

    it('demotes after three weak answers', async () => {
      const model = new ScriptedModel({ critiqueAnswer: [5, 5, 5].map(score => critiqueJson(score)) });
      const coach = build(model, { maxIterations: 1 });

      const results = await runMockInterview(coach, 3);

      expect(results[2].score).toBe(5);
      expect(results[2].difficultyAfter).toBe(Difficulty.Easy);
      expect(coach.store.requireSession().mock.difficultyHistory).toEqual([Difficulty.Medium, Difficulty.Easy]);
    });

    it('averages only the configured window', async () => {
      const model = new ScriptedModel({ critiqueAnswer: [9, 9, 9, 5, 5, 5].map(score => critiqueJson(score)) });
      const coach = build(model, { maxIterations: 1, difficultyWindow: 3 });

      const results = await runMockInterview(coach, 6);

      expect(results[2].difficultyAfter).toBe(Difficulty.Hard);
      expect(results[5].difficultyAfter).toBe(Difficulty.Medium);
    });

    it('never serves a question twice, whatever callers do to returned state', async () => {
      const coach = build(new ScriptedModel());
      await coach.prepareMockInterview('Acme', 'Engineer', 'Build APIs');
      const first = coach.startMockInterview();

      first.question.question = 'edited';
      const snapshot = coach.store.current;
      if (snapshot) snapshot.mock.currentQuestionIndex = 0;

      const next = coach.getNextMockQuestion();
      expect(next?.currentIndex).toBe(2);
      expect(next?.question.question).toBe('behavioral question 2');
      expect(coach.store.requireSession().mock.generatedQuestions[0].question).toBe('behavioral question 1');
    });

    it('flags and logs a fallback score', async () => {
      const model = new ScriptedModel({ critiqueAnswer: ['no score today'] });
      const coach = build(model, { maxIterations: 1 });

      const [result] = await runMockInterview(coach, 1);

      expect(result.score).toBe(7);
      expect(result.scoreIsFallback).toBe(true);
      expect(coach.log.entries().filter(e => e.includes('neutral fallback'))).toEqual([
        '[2026-01-01T00:00:00.000Z] [WARN] Mock answer 1 scored with the neutral fallback (No JSON found in model output).',
      ]);
    });

    it('does not flag a real score', async () => {
      const coach = build(new ScriptedModel({ critiqueAnswer: [critiqueJson(8)] }));
      const [result] = await runMockInterview(coach, 1);

      expect(result.scoreIsFallback).toBe(false);
    });
  });
});
