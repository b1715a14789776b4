import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './lib/errors.js';

export const DEFAULT_PROFILE_PATH = fileURLToPath(new URL('./data/profile.yaml', import.meta.url));

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://localhost:8501'];

const envBool = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const positiveInt = z.coerce.number().int().positive();
const weight = z.coerce.number().min(0).max(1);
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'ollama', 'anthropic']).default('ollama'),
  LLM_ENDPOINT_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).default('llama3:8b'),
  LLM_API_KEY: optionalString,
  LLM_REQUEST_TIMEOUT_MS: positiveInt.default(60_000),
  LLM_MAX_TOKENS: positiveInt.default(1200),
  LLM_RETRY_BASE_DELAY_MS: positiveInt.default(500),

  ENABLE_WEB_SEARCH: envBool.default('true'),
  SEARCH_PROVIDER: z.enum(['duckduckgo', 'perplexity']).default('duckduckgo'),
  PERPLEXITY_API_KEY: optionalString,
  RESEARCH_TIMEOUT_MS: positiveInt.default(15_000),

  FETCH_TIMEOUT_MS: positiveInt.default(30_000),

  PROFILE_PATH: z.string().min(1).default(DEFAULT_PROFILE_PATH),
  PROFILE_PRIMARY_LANGUAGE: z.enum(['en', 'es']).default('es'),
  PROFILE_TRANSLATION_PATH: optionalString,
  PHONE_NUMBER: optionalString,

  PORT: positiveInt.default(8000),
  ALLOWED_ORIGINS: optionalString,
  RATE_LIMIT_MAX_REQUESTS: positiveInt.default(20),
  RATE_LIMIT_WINDOW_MS: positiveInt.default(60_000),
  MAX_BODY_BYTES: positiveInt.default(200_000),
  TRUST_PROXY: envBool.default('false'),

  RETRIEVAL_TECH_WEIGHT: weight.default(0.6),
  RETRIEVAL_RECENCY_WEIGHT: weight.default(0.25),
  RETRIEVAL_ROLE_WEIGHT: weight.default(0.15),
  RETRIEVAL_INDUSTRY_WEIGHT: weight.default(0.2),
});

export type LlmProviderName = 'openai' | 'ollama' | 'anthropic';
export type SearchProviderName = 'duckduckgo' | 'perplexity';

export interface LlmConfig {
  provider: LlmProviderName;
  endpointUrl: string;
  modelId: string;
  apiKey?: string;
  requestTimeoutMs: number;
  maxTokens: number;
  retryBaseDelayMs: number;
}

export interface ResearchConfig {
  enableWebSearch: boolean;
  provider: SearchProviderName;
  perplexityApiKey?: string;
  timeoutMs: number;
}

export interface RetrievalWeights {
  technology: number;
  recency: number;
  role: number;
  /** Share of the job's industry tags found in the experience's tags. */
  industry: number;
}

export interface AppConfig {
  llm: LlmConfig;
  research: ResearchConfig;
  fetch: { timeoutMs: number };
  profile: {
    path: string;
    primaryLanguage: 'en' | 'es';
    /** The same profile written in the other language, for static CVs in that language. */
    translationPath?: string;
    phoneOverride?: string;
  };
  server: {
    port: number;
    allowedOrigins: string[];
    rateLimit: { maxRequests: number; windowMs: number };
    maxBodyBytes: number;
    trustProxy: boolean;
  };
  retrieval: { weights: RetrievalWeights };
}

function defaultEndpoint(provider: LlmProviderName): string {
  switch (provider) {
    case 'ollama':
      return 'http://localhost:11434';
    case 'openai':
      return 'https://api.openai.com/v1';
    case 'anthropic':
      return 'https://api.anthropic.com';
  }
}

/**
 * Builds the process configuration from environment variables. Called once at
 * startup; the result is passed by reference to every component constructor.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const blankToUndefined = Object.fromEntries(
    Object.entries(env).map(([k, v]) => [k, v === '' ? undefined : v]),
  );
  const parsed = EnvSchema.safeParse(blankToUndefined);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  if (e.LLM_PROVIDER === 'anthropic' && !e.LLM_API_KEY) {
    throw new ConfigError('Invalid configuration: LLM_API_KEY is required when LLM_PROVIDER=anthropic');
  }
  if (e.ENABLE_WEB_SEARCH && e.SEARCH_PROVIDER === 'perplexity' && !e.PERPLEXITY_API_KEY) {
    throw new ConfigError('Invalid configuration: PERPLEXITY_API_KEY is required when SEARCH_PROVIDER=perplexity');
  }

  return {
    llm: {
      provider: e.LLM_PROVIDER,
      endpointUrl: (e.LLM_ENDPOINT_URL ?? defaultEndpoint(e.LLM_PROVIDER)).replace(/\/$/, ''),
      modelId: e.LLM_MODEL,
      apiKey: e.LLM_API_KEY,
      requestTimeoutMs: e.LLM_REQUEST_TIMEOUT_MS,
      maxTokens: e.LLM_MAX_TOKENS,
      retryBaseDelayMs: e.LLM_RETRY_BASE_DELAY_MS,
    },
    research: {
      enableWebSearch: e.ENABLE_WEB_SEARCH,
      provider: e.SEARCH_PROVIDER,
      perplexityApiKey: e.PERPLEXITY_API_KEY,
      timeoutMs: e.RESEARCH_TIMEOUT_MS,
    },
    fetch: { timeoutMs: e.FETCH_TIMEOUT_MS },
    profile: {
      path: e.PROFILE_PATH,
      primaryLanguage: e.PROFILE_PRIMARY_LANGUAGE,
      translationPath: e.PROFILE_TRANSLATION_PATH,
      phoneOverride: e.PHONE_NUMBER,
    },
    server: {
      port: e.PORT,
      allowedOrigins: e.ALLOWED_ORIGINS
        ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
        : DEFAULT_ORIGINS,
      rateLimit: { maxRequests: e.RATE_LIMIT_MAX_REQUESTS, windowMs: e.RATE_LIMIT_WINDOW_MS },
      maxBodyBytes: e.MAX_BODY_BYTES,
      trustProxy: e.TRUST_PROXY,
    },
    retrieval: {
      weights: {
        technology: e.RETRIEVAL_TECH_WEIGHT,
        recency: e.RETRIEVAL_RECENCY_WEIGHT,
        role: e.RETRIEVAL_ROLE_WEIGHT,
        industry: e.RETRIEVAL_INDUSTRY_WEIGHT,
      },
    },
  };
}
