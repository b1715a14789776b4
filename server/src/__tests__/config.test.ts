import { describe, it, expect } from 'vitest';
import { DEFAULT_PROFILE_PATH, loadConfig } from '../config.js';
import { ConfigError } from '../lib/errors.js';
import { loadProfile } from '../profile/loader.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.llm).toEqual({
      provider: 'ollama',
      endpointUrl: 'http://localhost:11434',
      modelId: 'llama3:8b',
      apiKey: undefined,
      requestTimeoutMs: 60_000,
      maxTokens: 1200,
      retryBaseDelayMs: 500,
    });
    expect(config.research).toMatchObject({ enableWebSearch: true, provider: 'duckduckgo', timeoutMs: 15_000 });
    expect(config.profile).toMatchObject({ path: DEFAULT_PROFILE_PATH, primaryLanguage: 'es' });
    expect(config.server).toMatchObject({
      port: 8000,
      rateLimit: { maxRequests: 20, windowMs: 60_000 },
      maxBodyBytes: 200_000,
      trustProxy: false,
    });
    expect(config.retrieval.weights).toEqual({ technology: 0.6, recency: 0.25, role: 0.15, industry: 0.2 });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'openai',
      LLM_ENDPOINT_URL: 'https://llm.example.com/v1/',
      LLM_API_KEY: 'test-secret',
      ENABLE_WEB_SEARCH: 'no',
      PHONE_NUMBER: '',
      ALLOWED_ORIGINS: 'https://a.example, https://b.example',
      RETRIEVAL_ROLE_WEIGHT: '0.3',
      PROFILE_TRANSLATION_PATH: '/profiles/cv.en.yaml',
    });

    expect(config.llm).toMatchObject({ provider: 'openai', endpointUrl: 'https://llm.example.com/v1', apiKey: 'test-secret' });
    expect(config.research.enableWebSearch).toBe(false);
    expect(config.profile.phoneOverride).toBeUndefined();
    expect(config.server.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.retrieval.weights.role).toBe(0.3);
    expect(config.profile.translationPath).toBe('/profiles/cv.en.yaml');
  });

  it('rejects malformed values with ConfigError', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ LLM_PROVIDER: 'mystery' })).toThrow(/LLM_PROVIDER/);
    expect(() => loadConfig({ RETRIEVAL_TECH_WEIGHT: '2' })).toThrow(/RETRIEVAL_TECH_WEIGHT/);
  });

  it('requires keys for providers that need them', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'anthropic' })).toThrow(
      'Invalid configuration: LLM_API_KEY is required when LLM_PROVIDER=anthropic',
    );
    expect(() => loadConfig({ SEARCH_PROVIDER: 'perplexity' })).toThrow(
      'Invalid configuration: PERPLEXITY_API_KEY is required when SEARCH_PROVIDER=perplexity',
    );
    expect(loadConfig({ SEARCH_PROVIDER: 'perplexity', ENABLE_WEB_SEARCH: 'false' }).research.provider).toBe('perplexity');
  });
});

describe('bundled sample profile', () => {
  it('loads and validates', async () => {
    const profile = await loadProfile(DEFAULT_PROFILE_PATH, { primaryLanguage: 'es', phoneOverride: '+34 600 000 000' });

    expect(profile.companies.length).toBeGreaterThan(0);
    expect(profile.personalInfo.phone).toBe('+34 600 000 000');
  });
});
