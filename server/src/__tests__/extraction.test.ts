import { describe, it, expect, vi } from 'vitest';
import { MalformedCompletionError } from '../lib/errors.js';
import type { CompletionRequest, CompletionResponse } from '../lib/llm-provider.js';
import logger from '../lib/logger.js';
import { AdaptationService } from '../tailoring/adaptation-service.js';
import {
  defaultExtractionChain,
  detectSeniority,
  ExtractionChain,
  extractRole,
  HeuristicExtractionStrategy,
  ModelExtractionStrategy,
} from '../tailoring/extraction.js';
import { fakeProvider, unreachableProvider } from './fixtures.js';

const POSTING = [
  'We are looking for a Senior Backend Engineer to join our fintech team.',
  'Requirements:',
  '- 5+ years of experience with Java and Spring Boot',
  '- Experience running Kafka in production',
  'We offer remote work.',
].join('\n');

const CONFIG = { maxTokens: 500, retryBaseDelayMs: 1 };

describe('HeuristicExtractionStrategy', () => {
  it('builds a signal from keywords and patterns', () => {
    const signal = new HeuristicExtractionStrategy().buildSignal(POSTING, 'en');

    expect(signal).toEqual({
      language: 'en',
      role: 'Senior Backend Engineer',
      seniority: 'senior',
      technologies: ['Java', 'Spring Boot', 'Kafka'],
      company: null,
      requirements: ['5+ years of experience with Java and Spring Boot', 'Experience running Kafka in production'],
      industryTags: ['finance'],
      minYearsExperience: 5,
      source: 'heuristic',
    });
  });

  it('reads Spanish role phrasing', () => {
    expect(extractRole('Buscamos un Ingeniero Backend con experiencia en Java.', 'es')).toBe('Ingeniero Backend');
  });

  it('prefers the most senior level mentioned', () => {
    expect(detectSeniority('Staff engineer, senior mentors welcome')).toBe('principal');
    expect(detectSeniority('Desarrollador junior')).toBe('junior');
    expect(detectSeniority('Backend developer')).toBeNull();
  });
});

describe('ModelExtractionStrategy', () => {
  it('takes model fields and fills the rest from the text', async () => {
    const { provider } = fakeProvider(
      () => '{"role": "Backend Engineer", "seniority": "Senior", "technologies": ["Java", "java", "Kafka"], "company": "Acme", "requirements": []}',
    );
    const strategy = new ModelExtractionStrategy(new AdaptationService({ provider, config: CONFIG }), false);

    const outcome = await strategy.extract(POSTING, 'en');

    expect(outcome).toEqual({
      status: 'ok',
      signal: {
        language: 'en',
        role: 'Backend Engineer',
        seniority: 'senior',
        technologies: ['Java', 'Kafka'],
        company: 'Acme',
        requirements: ['5+ years of experience with Java and Spring Boot', 'Experience running Kafka in production'],
        industryTags: ['finance'],
        minYearsExperience: 5,
        source: 'model',
      },
    });
  });

  it('reports output with neither role nor technologies as malformed', async () => {
    const { provider } = fakeProvider(() => '{"role": null, "technologies": []}');
    const strategy = new ModelExtractionStrategy(new AdaptationService({ provider, config: CONFIG }), true);

    expect(await strategy.extract(POSTING, 'en')).toEqual({
      status: 'malformed',
      reason: 'Extraction returned neither a role nor technologies',
    });
  });
});

describe('ExtractionChain', () => {
  it('tries the strict prompt after malformed output, then the heuristic', async () => {
    const { provider, complete } = fakeProvider(() => 'Sorry, I cannot help with that.');
    const chain = defaultExtractionChain(new AdaptationService({ provider, config: CONFIG }), logger);

    const signal = await chain.run(POSTING, 'en');

    expect(signal.source).toBe('heuristic');
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[1]?.[0].system).toMatch(/^You are a JSON generator/);
  });

  it('still tries the strict prompt when the endpoint replies with an unreadable body', async () => {
    const complete = vi.fn(async (_request: CompletionRequest): Promise<CompletionResponse> => {
      throw new MalformedCompletionError('Completion API reply has an unexpected shape (choices: Expected array, received string)');
    });
    const provider = { name: 'fake', model: 'fake-model', complete };
    const chain = defaultExtractionChain(new AdaptationService({ provider, config: CONFIG }), logger);

    const signal = await chain.run(POSTING, 'en');

    expect(signal.source).toBe('heuristic');
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[1]?.[0].system).toMatch(/^You are a JSON generator/);
  });

  it('skips further model strategies once the endpoint is unavailable', async () => {
    const { provider, complete } = unreachableProvider();
    const chain = defaultExtractionChain(new AdaptationService({ provider, config: CONFIG }), logger);

    const signal = await chain.run(POSTING, 'en');

    expect(signal.source).toBe('heuristic');
    expect(signal.role).toBe('Senior Backend Engineer');
    // one strategy, two attempts
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('needs at least one strategy', () => {
    expect(() => new ExtractionChain([], logger)).toThrow('ExtractionChain needs at least one strategy');
  });
});
