import { describe, expect, it } from 'vitest';
import { Type } from '@google/genai';
import { Difficulty } from '../types';
import { GeminiCoach } from './gemini';
import { FakeClient } from './testing/fakes';

const settings = { apiKey: 'test-key', model: 'test-model', temperature: 0.7 };

describe('GeminiCoach', () => {
  it('requests structured JSON for critiques', async () => {
    const client = new FakeClient('{"overall":8}');
    const coach = new GeminiCoach(settings, client);

    expect(await coach.critiqueAnswer('Why Acme?', 'Because', 'CV')).toBe('{"overall":8}');

    const [request] = client.requests;
    expect(request.model).toBe('test-model');
    expect(request.config?.temperature).toBe(0.3);
    expect(request.config?.responseMimeType).toBe('application/json');
    expect(request.config?.responseSchema).toMatchObject({ required: ['scores', 'overall', 'strengths', 'improvements'] });
    expect(request.config?.systemInstruction).toBe('You are a strict interview coach.');
  });

  it('generates free text with the configured temperature and the previous exchange', async () => {
    const client = new FakeClient();
    const coach = new GeminiCoach(settings, client);

    await coach.generateAnswer({
      question: 'Why that approach?',
      analysis: '',
      context: {
        cv: '',
        experience: '',
        personality: '',
        company: '',
        previousExchange: { question: 'Tell me about a project', answer: 'I rebuilt billing' },
      },
      iteration: 1,
      guidance: '',
    });

    const [request] = client.requests;
    expect(request.config?.temperature).toBe(0.7);
    expect(request.config?.responseMimeType).toBeUndefined();
    expect(request.contents).toContain('Answer given: I rebuilt billing');
  });

  it('asks for an array of mock questions at the creative temperature', async () => {
    const client = new FakeClient('[]');
    const coach = new GeminiCoach(settings, client);

    await coach.generateMockQuestions({
      type: 'technical',
      count: 4,
      companyName: 'Acme',
      position: 'Engineer',
      jobDescription: 'Build APIs',
      companyResearch: '',
      difficulty: Difficulty.Hard,
    });

    const [request] = client.requests;
    expect(request.config?.temperature).toBe(0.8);
    expect(request.config?.responseSchema).toMatchObject({ type: Type.ARRAY });
    expect(request.contents).toContain('Generate 4 technical interview questions for Engineer at Acme.');
  });

  it('rejects an empty response', async () => {
    const coach = new GeminiCoach(settings, new FakeClient(''));
    await expect(coach.refineAnswer('Draft', [])).rejects.toThrow('Empty response');
  });

  it('rejects without an API key', async () => {
    const coach = new GeminiCoach({ ...settings, apiKey: null });
    await expect(coach.analyzeQuestion('Why Acme?', '')).rejects.toThrow('GEMINI_API_KEY not found in environment');
  });
});
