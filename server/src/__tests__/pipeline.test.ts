import { describe, it, expect, vi } from 'vitest';
import { LanguageUnavailableError } from '../lib/errors.js';
import type { CompletionProvider, CompletionRequest } from '../lib/llm-provider.js';
import type { ProfessionalProfile } from '../profile/types.js';
import logger from '../lib/logger.js';
import { AdaptationService } from '../tailoring/adaptation-service.js';
import { defaultClosing, defaultOpening } from '../tailoring/composer.js';
import { defaultExtractionChain } from '../tailoring/extraction.js';
import { JobAnalyzer } from '../tailoring/job-analyzer.js';
import { TailoringPipeline } from '../tailoring/pipeline.js';
import { ResearchHelper, type SearchProvider, type SearchResult } from '../tailoring/research.js';
import { DEFAULT_RETRIEVAL_WEIGHTS } from '../tailoring/retriever.js';
import { fakeProvider, testProfile, testTranslation, unreachableProvider } from './fixtures.js';

const POSTING = [
  'We are looking for a Senior Backend Engineer to join our fintech team.',
  'Requirements:',
  '- 5+ years of experience with Java and Spring Boot',
  '- Experience running Kafka in production',
].join('\n');

const SPANISH_POSTING = 'Buscamos un Ingeniero Backend con experiencia en Java y Kafka. Requisitos: trabajo en equipo.';

const ACME_RESULTS: SearchResult[] = [
  {
    title: 'Acme Corp - Fintech payments',
    snippet: 'Acme builds payment software for banks. Our culture values ownership.',
    url: 'https://acme.example/about',
  },
];

function respondBySlot(request: CompletionRequest): string {
  if (request.system.startsWith('Parse job descriptions')) {
    return '{"role": "Backend Engineer", "technologies": ["Java", "Spring Boot"], "company": "Acme"}';
  }
  if (request.system.startsWith('You rewrite professional CV summaries')) return 'Adapted summary.';
  if (request.system.startsWith('You select the key skills')) return 'Java, Kafka';
  if (request.system.startsWith('You rewrite CV achievement bullets')) {
    return '- Built the ledger service in Java\n- Cut settlement latency by 40% with Kafka';
  }
  if (request.system.startsWith('Translator')) return 'Ingeniero Backend Sénior';
  return 'Adapted paragraph.';
}

function buildPipeline(
  provider: CompletionProvider,
  options: { searchResults?: SearchResult[]; translations?: ProfessionalProfile[] } = {},
) {
  const profile = testProfile('en');
  const adaptation = new AdaptationService({ provider, config: { maxTokens: 500, retryBaseDelayMs: 1 } });
  const search = vi.fn(async (): Promise<SearchResult[]> => options.searchResults ?? []);
  const searchProvider: SearchProvider = { name: 'fake-search', search };
  const pipeline = new TailoringPipeline({
    profile,
    translations: options.translations,
    analyzer: new JobAnalyzer({
      chain: defaultExtractionChain(adaptation, logger),
      primaryLanguage: profile.primaryLanguage,
      fetchTimeoutMs: 1000,
      logger,
    }),
    adaptation,
    research: new ResearchHelper({
      provider: searchProvider,
      config: { enableWebSearch: options.searchResults !== undefined, timeoutMs: 1000 },
      logger,
    }),
    weights: DEFAULT_RETRIEVAL_WEIGHTS,
    logger,
  });
  return { pipeline, profile, search };
}

describe('TailoringPipeline.composeStaticCv', () => {
  it('composes from the profile without any completion call', () => {
    const { provider, complete } = fakeProvider(respondBySlot);
    const { pipeline, profile } = buildPipeline(provider);

    const cv = pipeline.composeStaticCv();

    expect(complete).not.toHaveBeenCalled();
    expect(cv.language).toBe('en');
    expect(cv.summary).toBe(profile.summary.detailed);
    expect(cv.experiences.map((e) => e.id)).toEqual(['paycorp-backend', 'datacorp-1']);
  });

  it('takes headings and text from the profile written in the requested language', () => {
    const { provider } = fakeProvider(respondBySlot);
    const { pipeline } = buildPipeline(provider, { translations: [testTranslation()] });

    const cv = pipeline.composeStaticCv('es');

    expect(cv.headings.skills).toBe('Habilidades');
    expect(cv.summary).toBe('Ingeniero backend con diez años construyendo sistemas de pago y logística en la JVM y Python.');
    expect(cv.experiences[0]).toMatchObject({ id: 'paycorp-backend', title: 'Ingeniero Backend Sénior' });
    expect(cv.experiences[0]?.bullets[0]).toBe('Construí el servicio de ledger que procesa 2M de transacciones al día');
  });

  it('refuses a language the profile has no text in', () => {
    const { provider } = fakeProvider(respondBySlot);
    const { pipeline } = buildPipeline(provider);

    expect(() => pipeline.composeStaticCv('es')).toThrow(LanguageUnavailableError);
    expect(() => pipeline.composeStaticCv('es')).toThrow('Profile content is not available in "es" (available: en)');
  });
});

describe('TailoringPipeline.composeTailoredCv', () => {
  it('adapts slots and falls back where the output fails the fidelity guard', async () => {
    const { provider } = fakeProvider(respondBySlot);
    const { pipeline } = buildPipeline(provider);

    const result = await pipeline.composeTailoredCv(POSTING);

    expect(result.signal).toMatchObject({ source: 'model', role: 'Backend Engineer', company: 'Acme' });
    expect(result.provenance).toEqual({
      summary: 'adapted',
      skills: 'adapted',
      'position:paycorp-backend:bullets': 'adapted',
      'position:datacorp-1:bullets': 'fallback',
    });
    expect(result.document.summary).toBe('Adapted summary.');
    expect(result.document.skills[0]).toEqual({ category: 'Key Skills', items: ['Java', 'Kafka'] });
    expect(result.document.experiences[0]?.bullets).toEqual([
      'Built the ledger service in Java',
      'Cut settlement latency by 40% with Kafka',
    ]);
    expect(result.document.experiences[1]?.bullets).toEqual([
      'Trained demand forecasting models in TensorFlow',
      'Shipped a Python feature store used by four teams',
    ]);
    expect(result.companyFacts).toBeNull();
  });

  it('still produces a CV when the completion endpoint is unreachable', async () => {
    const { provider } = unreachableProvider();
    const { pipeline, profile } = buildPipeline(provider);

    const result = await pipeline.composeTailoredCv(POSTING);

    expect(result.signal.source).toBe('heuristic');
    expect(Object.values(result.provenance).every((p) => p === 'fallback')).toBe(true);
    expect(result.document.summary).toBe(profile.summary.detailed);
    expect(result.document.experiences.map((e) => e.id)).toEqual(['paycorp-backend', 'datacorp-1']);
  });

  it('translates role titles when the posting is not in the profile language', async () => {
    const { provider } = fakeProvider(respondBySlot);
    const { pipeline } = buildPipeline(provider);

    const result = await pipeline.composeTailoredCv(SPANISH_POSTING);

    expect(result.signal.language).toBe('es');
    expect(result.provenance['position:paycorp-backend:role']).toBe('adapted');
    expect(result.document.headings.experience).toBe('Experiencia Profesional');
    expect(result.document.experiences.find((e) => e.id === 'paycorp-backend')?.title).toBe('Ingeniero Backend Sénior');
  });

  it('starts from the translated profile when the posting is in its language', async () => {
    const { provider, complete } = fakeProvider(respondBySlot);
    const { pipeline } = buildPipeline(provider, { translations: [testTranslation()] });

    const result = await pipeline.composeTailoredCv(SPANISH_POSTING);

    expect(result.provenance['position:paycorp-backend:role']).toBeUndefined();
    expect(result.document.experiences.find((e) => e.id === 'paycorp-backend')?.title).toBe('Ingeniero Backend Sénior');
    expect(complete.mock.calls.some(([request]) => request.system.startsWith('Translator'))).toBe(false);
  });

  it('serves repeated requests from the adaptation cache', async () => {
    const { provider, complete } = fakeProvider(respondBySlot);
    const { pipeline } = buildPipeline(provider);

    await pipeline.composeTailoredCv(POSTING);
    const callsAfterFirst = complete.mock.calls.length;
    const second = await pipeline.composeTailoredCv(POSTING);

    // extraction repeats, and so does the slot that failed the fidelity guard
    expect(complete.mock.calls.length).toBe(callsAfterFirst + 2);
    expect(second.provenance.summary).toBe('cached');
  });
});

describe('TailoringPipeline.composeCoverLetter', () => {
  it('researches the named company and falls back to default paragraphs', async () => {
    const { provider } = unreachableProvider();
    const { pipeline, profile, search } = buildPipeline(provider, { searchResults: ACME_RESULTS });

    const result = await pipeline.composeCoverLetter(POSTING, 'Acme');

    expect(search).toHaveBeenCalledTimes(1);
    expect(result.companyFacts?.industry).toBe('finance');
    expect(result.document.greeting).toBe('Dear Acme Hiring Team,');
    expect(result.document.opening).toBe(defaultOpening(profile, 'en', 'Senior Backend Engineer', 'Acme'));
    expect(result.document.closing).toBe(defaultClosing('en', 'Acme'));
    expect(result.document.highlights.map((h) => h.id)).toEqual(['paycorp-backend', 'ledger', 'datacorp-1']);
    expect(result.document.highlights[1]?.bullets).toEqual(['Designed the double-entry data model']);
  });

  it('passes company facts to the opening prompt', async () => {
    const { provider, complete } = fakeProvider(respondBySlot);
    const { pipeline } = buildPipeline(provider, { searchResults: ACME_RESULTS });

    const result = await pipeline.composeCoverLetter(POSTING, 'Acme');
    const openingCall = complete.mock.calls.find(([request]) =>
      request.system.startsWith('You write the opening paragraph'),
    );

    expect(openingCall?.[0].prompt).toContain('Industry: finance');
    expect(result.document.opening).toBe('Adapted paragraph.');
    expect(result.provenance['letter:opening']).toBe('adapted');
  });

  it('skips research when no company is known', async () => {
    const { provider } = unreachableProvider();
    const { pipeline, search } = buildPipeline(provider, { searchResults: ACME_RESULTS });

    const result = await pipeline.composeCoverLetter(POSTING);

    expect(search).not.toHaveBeenCalled();
    expect(result.document.company).toBeNull();
    expect(result.document.greeting).toBe('Dear Hiring Manager,');
  });
});
