import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { ResearchConfig } from '../config.js';
import { ResearchError, UpstreamHttpError } from '../lib/errors.js';
import { errorMessage, type Logger } from '../lib/logger.js';
import { extractIndustryTags } from './extraction.js';
import type { CompanyFacts } from './types.js';

const MAX_RESULTS = 5;
const MAX_OVERVIEW_CHARS = 500;
const CULTURE_KEYWORDS = ['culture', 'values', 'mission', 'vision', 'team', 'cultura', 'valores', 'misión', 'equipo'];

export interface SearchResult {
  title: string;
  snippet: string;
  url: string;
}

export interface SearchOptions {
  signal: AbortSignal;
  maxResults: number;
}

/** Company-name query in, textual snippets out. Empty lists are normal. */
export interface SearchProvider {
  readonly name: string;
  search(query: string, options: SearchOptions): Promise<SearchResult[]>;
}

// ─── DuckDuckGo (HTML results page, no key) ──────────────────────────

const DUCKDUCKGO_URL = 'https://html.duckduckgo.com/html/';

function unwrapRedirect(href: string): string {
  try {
    const url = new URL(href, 'https://duckduckgo.com');
    const target = url.searchParams.get('uddg');
    return target ?? url.toString();
  } catch {
    return href;
  }
}

export function parseDuckDuckGoResults(html: string, maxResults: number): SearchResult[] {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];
  $('.result').each((_, el) => {
    if (results.length >= maxResults) return false;
    const node = $(el);
    const link = node.find('.result__a').first();
    const title = link.text().trim();
    const snippet = node.find('.result__snippet').first().text().replace(/\s+/g, ' ').trim();
    if (title && snippet) {
      results.push({ title, snippet, url: unwrapRedirect(link.attr('href') ?? '') });
    }
    return undefined;
  });
  return results;
}

export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = 'duckduckgo';

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    const url = `${DUCKDUCKGO_URL}?${new URLSearchParams({ q: query }).toString()}`;
    const response = await fetch(url, {
      headers: {
        'User-Agent':
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
        Accept: 'text/html',
      },
      signal: options.signal,
    });
    if (!response.ok) {
      throw new UpstreamHttpError(`DuckDuckGo search error ${response.status}`, response.status, response.headers);
    }
    return parseDuckDuckGoResults(await response.text(), options.maxResults);
  }
}

// ─── Perplexity (chat answer as snippets) ────────────────────────────

const PERPLEXITY_URL = 'https://api.perplexity.ai/chat/completions';
const PERPLEXITY_MODEL = 'sonar-pro';

const PerplexityResponseSchema = z
  .object({
    choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).passthrough() }).passthrough()),
    citations: z.array(z.string()).optional(),
  })
  .passthrough();

export class PerplexitySearchProvider implements SearchProvider {
  readonly name = 'perplexity';

  constructor(private readonly apiKey: string) {}

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    const response = await fetch(PERPLEXITY_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: PERPLEXITY_MODEL,
        temperature: 0.2,
        max_tokens: 800,
        messages: [
          { role: 'system', content: 'You are a company research analyst. Return concise, factual information. Say so when unsure.' },
          { role: 'user', content: `Research ${query}: industry, size, culture and values, recent news.` },
        ],
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text().catch(() => '');
      throw new UpstreamHttpError(`Perplexity API error (${response.status}): ${error.slice(0, 200)}`, response.status);
    }

    const parsed = PerplexityResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ResearchError('Perplexity response has an unexpected shape');
    }
    const content = parsed.data.choices[0]?.message.content ?? '';
    const citations = parsed.data.citations ?? [];
    return content
      .split(/\n{2,}/)
      .map((paragraph) => paragraph.replace(/\[\d+\]/g, '').replace(/\s+/g, ' ').trim())
      .filter((paragraph) => paragraph.length > 0)
      .slice(0, options.maxResults)
      .map((snippet, i) => ({ title: query, snippet, url: citations[i] ?? '' }));
  }
}

export function createSearchProvider(config: ResearchConfig): SearchProvider {
  if (config.provider === 'perplexity' && config.perplexityApiKey) {
    return new PerplexitySearchProvider(config.perplexityApiKey);
  }
  return new DuckDuckGoSearchProvider();
}

// ─── Summaries ───────────────────────────────────────────────────────

export function emptyFacts(company: string): CompanyFacts {
  return { company, overview: null, industry: null, culture: [], sources: [] };
}

export function hasFacts(facts: CompanyFacts): boolean {
  return facts.overview !== null || facts.industry !== null || facts.culture.length > 0;
}

function sentences(text: string): string[] {
  return text.split(/(?<=[.!?])\s+/).map((s) => s.trim()).filter(Boolean);
}

/** Condense search snippets into facts. Only snippet text is used, nothing is inferred. */
export function summarizeResults(company: string, results: readonly SearchResult[]): CompanyFacts {
  if (results.length === 0) return emptyFacts(company);

  const lowerCompany = company.toLowerCase();
  const relevant = results.filter(
    (r) => r.title.toLowerCase().includes(lowerCompany) || r.snippet.toLowerCase().includes(lowerCompany),
  );
  const overviewText = relevant.slice(0, 2).map((r) => r.snippet).join(' ').trim();
  const overview = overviewText
    ? overviewText.length > MAX_OVERVIEW_CHARS ? `${overviewText.slice(0, MAX_OVERVIEW_CHARS - 3)}...` : overviewText
    : null;

  const allText = results.map((r) => `${r.title} ${r.snippet}`).join('\n');
  const industry = extractIndustryTags(allText)[0] ?? null;

  const culture = results
    .flatMap((r) => sentences(r.snippet))
    .filter((s) => CULTURE_KEYWORDS.some((kw) => s.toLowerCase().includes(kw)))
    .slice(0, 3)
    .map((s) => (s.length > 150 ? `${s.slice(0, 147)}...` : s));

  const sources = results.map((r) => r.url).filter(Boolean).slice(0, 3);

  return { company, overview, industry, culture, sources };
}

/** Company context block for prompt source text; empty when nothing was found. */
export function formatCompanyFacts(facts: CompanyFacts): string {
  if (!hasFacts(facts)) return '';
  const parts = [`Company: ${facts.company}`];
  if (facts.industry) parts.push(`Industry: ${facts.industry}`);
  if (facts.overview) parts.push(`Overview: ${facts.overview}`);
  if (facts.culture.length > 0) parts.push(`Culture & values: ${facts.culture.join(' ')}`);
  return parts.join('\n');
}

// ─── Helper ──────────────────────────────────────────────────────────

export interface ResearchHelperDeps {
  provider: SearchProvider;
  config: Pick<ResearchConfig, 'enableWebSearch' | 'timeoutMs'>;
  logger: Logger;
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/**
 * Best-effort company research. `research` never rejects: a disabled switch,
 * a missing company name, a timeout or any provider failure all give empty
 * facts. Non-empty results are cached per company and role.
 */
export class ResearchHelper {
  private readonly cache = new Map<string, CompanyFacts>();

  constructor(private readonly deps: ResearchHelperDeps) {}

  get enabled(): boolean {
    return this.deps.config.enableWebSearch;
  }

  async research(company: string | null | undefined, role?: string | null): Promise<CompanyFacts> {
    const name = company?.trim() ?? '';
    if (!this.enabled || !name) return emptyFacts(name);

    const key = `${name.toLowerCase()}::${role?.trim().toLowerCase() ?? ''}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    try {
      const results = await this.searchWithTimeout(role ? `${name} ${role}` : `${name} company`);
      const facts = summarizeResults(name, results);
      if (hasFacts(facts)) this.cache.set(key, facts);
      this.deps.logger.debug({ company: name, results: results.length }, 'Company research complete');
      return facts;
    } catch (err) {
      const error = err instanceof ResearchError ? err : new ResearchError(errorMessage(err), { cause: err });
      this.deps.logger.warn({ company: name, provider: this.deps.provider.name, error: error.message }, 'Company research failed');
      return emptyFacts(name);
    }
  }

  private async searchWithTimeout(query: string): Promise<SearchResult[]> {
    const { timeoutMs } = this.deps.config;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new ResearchError(`Company research timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref?.();
    try {
      return await Promise.race([
        this.deps.provider.search(query, { signal: controller.signal, maxResults: MAX_RESULTS }),
        rejectOnAbort(controller.signal),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
