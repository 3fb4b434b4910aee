import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createCoach } from './bootstrap';
import { FakeClient, critiqueJson } from './testing/fakes';

describe('createCoach', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('applies environment overrides', () => {
    const { config } = createCoach({ env: { MAX_ITERATIONS: '2', GEMINI_MODEL: 'test-model' } });
    expect(config.maxIterations).toBe(2);
    expect(config.model).toBe('test-model');
    expect(config.apiKey).toBeNull();
  });

  it('runs the loop through the Gemini adapter', async () => {
    const client = new FakeClient(critiqueJson(9));
    const { coach } = createCoach({ env: { GEMINI_API_KEY: 'test-key', GEMINI_MODEL: 'test-model' }, client });

    const result = await coach.practiceQuestion('Why Acme?');

    expect(result.finalState).toBe('DONE');
    expect(result.iterations).toBe(1);
    expect(result.critique.overall).toBe(9);
    expect(client.requests).toHaveLength(6);
    expect(client.requests.every(r => r.model === 'test-model')).toBe(true);
  });

  it('degrades every model call when no API key is set', async () => {
    const { coach } = createCoach({ env: {} });

    const result = await coach.practiceQuestion('Why Acme?');

    expect(result.finalState).toBe('ERROR');
    expect(result.error).toBe(
      'analysis: GEMINI_API_KEY not found in environment; generation: GEMINI_API_KEY not found in environment'
    );
  });
});
