import { describe, expect, it } from 'vitest';
import { Difficulty } from '../types';
import { extractJson, parseCritique, parseFollowUps, parseKeyPoints, parseMockQuestions } from './parsing';

describe('extractJson', () => {
  it('strips markdown fences', () => {
    expect(extractJson('```json\n{"a":1}\n```')).toEqual({ a: 1 });
  });

  it('finds JSON inside prose', () => {
    expect(extractJson('Here you go: {"a":1} thanks')).toEqual({ a: 1 });
  });

  it('throws when there is no JSON', () => {
    expect(() => extractJson('nothing here')).toThrow('No JSON found in model output');
  });
});

describe('parseCritique', () => {
  it('clamps scores and fills missing dimensions from the overall score', () => {
    const raw = JSON.stringify({
      scores: { authenticity: 8, relevance: 12 },
      overall: 7.5,
      strengths: ['Clear', ' '],
      improvements: ['More metrics'],
      fact_check: 'Matches the CV',
    });

    expect(parseCritique(raw)).toEqual({
      kind: 'parsed',
      value: {
        scores: { authenticity: 8, relevance: 10, structure: 7.5, specificity: 7.5, impact: 7.5, length: 7.5 },
        overall: 7.5,
        strengths: ['Clear'],
        improvements: ['More metrics'],
        factCheck: 'Matches the CV',
        isFallback: false,
      },
    });
  });

  it('falls back to neutral scores without a numeric overall', () => {
    const outcome = parseCritique('{"overall":"high"}');

    expect(outcome.kind).toBe('fallback');
    expect(outcome.value).toEqual({
      scores: { authenticity: 7, relevance: 7, structure: 7, specificity: 7, impact: 7, length: 7 },
      overall: 7,
      strengths: ['Answer provided'],
      improvements: ['Could be more specific'],
      isFallback: true,
      fallbackReason: 'Critique is missing a numeric overall score',
    });
  });

  it('falls back on non-JSON output', () => {
    const outcome = parseCritique('Great answer overall');
    expect(outcome).toMatchObject({ kind: 'fallback', reason: 'No JSON found in model output' });
    expect(outcome.value.overall).toBe(7);
  });
});

describe('parseKeyPoints', () => {
  it('accepts snake_case keys', () => {
    expect(parseKeyPoints('{"key_points":["Impact"],"delivery_tips":["Pause"]}')).toEqual({
      kind: 'parsed',
      value: { keyPoints: ['Impact'], deliveryTips: ['Pause'] },
    });
  });

  it('fills an empty list with its fallback bullet', () => {
    expect(parseKeyPoints('{"keyPoints":["Impact"]}')).toEqual({
      kind: 'parsed',
      value: { keyPoints: ['Impact'], deliveryTips: ['Practice delivery out loud'] },
    });
    expect(parseKeyPoints('{"deliveryTips":["Pause"],"keyPoints":[]}')).toEqual({
      kind: 'parsed',
      value: { keyPoints: ['Review the full answer'], deliveryTips: ['Pause'] },
    });
  });

  it('falls back when neither list is present', () => {
    expect(parseKeyPoints('{"summary":"fine"}')).toEqual({
      kind: 'fallback',
      value: { keyPoints: ['Review the full answer'], deliveryTips: ['Practice delivery out loud'] },
      reason: 'No keyPoints or deliveryTips in output',
    });
  });

  it('falls back for an array', () => {
    expect(parseKeyPoints('["a"]')).toEqual({
      kind: 'fallback',
      value: { keyPoints: ['Review the full answer'], deliveryTips: ['Practice delivery out loud'] },
      reason: 'Expected an object with keyPoints and deliveryTips',
    });
  });
});

describe('parseFollowUps', () => {
  it('keeps items with a question', () => {
    const raw = JSON.stringify({ followUps: [{ question: ' Why? ', reason: 'Depth' }, { reason: 'no question' }] });
    expect(parseFollowUps(raw)).toEqual({
      kind: 'parsed',
      value: [{ question: 'Why?', reason: 'Depth', guidance: '' }],
    });
  });

  it('falls back to an empty list without an array', () => {
    expect(parseFollowUps('{"foo":1}')).toEqual({ kind: 'fallback', value: [], reason: 'Expected a followUps array' });
  });
});

describe('parseMockQuestions', () => {
  it('forces the requested type and defaults the rest', () => {
    const raw = JSON.stringify([
      { question: ' Q1 ', type: 'technical', difficulty: 'HARD', themes: ['scale'], expected_framework: 'CAR' },
      { question: 'Q2' },
      { question: '' },
    ]);

    expect(parseMockQuestions(raw, 'behavioral', Difficulty.Medium)).toEqual({
      kind: 'parsed',
      value: [
        { question: 'Q1', type: 'behavioral', difficulty: Difficulty.Hard, themes: ['scale'], expectedFramework: 'CAR' },
        { question: 'Q2', type: 'behavioral', difficulty: Difficulty.Medium, themes: [], expectedFramework: 'STAR' },
      ],
    });
  });

  it('accepts a questions wrapper', () => {
    const outcome = parseMockQuestions('{"questions":[{"question":"What would you do?"}]}', 'situational', Difficulty.Easy);
    expect(outcome.value).toEqual([
      { question: 'What would you do?', type: 'situational', difficulty: Difficulty.Easy, themes: [], expectedFramework: 'CAR' },
    ]);
  });

  it('falls back without a list', () => {
    expect(parseMockQuestions('{"count":3}', 'technical', Difficulty.Medium)).toEqual({
      kind: 'fallback',
      value: [],
      reason: 'Expected a JSON array of questions',
    });
  });
});
