import { LLMUnavailableError, MalformedCompletionError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { AdaptationService, ExtractedFields } from './adaptation-service.js';
import { FidelityViolation } from './fidelity.js';
import { dedupeTerms, getLexicon, mentionedTechnologies, type Lexicon } from './lexicon.js';
import type { JobSignal, Language, Seniority } from './types.js';

const MAX_REQUIREMENTS = 10;
const MIN_REQUIREMENT_CHARS = 20;
const MAX_ROLE_CHARS = 100;

const SENIORITY_ORDER: readonly Seniority[] = ['principal', 'lead', 'senior', 'mid', 'junior'];

/**
 * Outcome of one strategy. `unavailable` tells the chain the endpoint is
 * down, so further model strategies would only repeat the same failure.
 */
export type ExtractionOutcome =
  | { status: 'ok'; signal: JobSignal }
  | { status: 'malformed'; reason: string }
  | { status: 'unavailable'; reason: string };

export interface ExtractionStrategy {
  readonly name: string;
  readonly usesModel: boolean;
  extract(text: string, language: Language): Promise<ExtractionOutcome>;
}

function cleanRole(value: string | null | undefined): string | null {
  if (!value) return null;
  const role = value.replace(/\s+/g, ' ').replace(/[.,;:]+$/, '').trim();
  return role && role.length <= MAX_ROLE_CHARS ? role : null;
}

function phraseMatches(phrase: string, lower: string): boolean {
  const escaped = phrase.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, 'u').test(lower);
}

export function detectSeniority(text: string, lexicon: Lexicon = getLexicon()): Seniority | null {
  const lower = text.toLowerCase();
  for (const level of SENIORITY_ORDER) {
    if (lexicon.seniority[level].some((phrase) => phraseMatches(phrase, lower))) return level;
  }
  return null;
}

function normalizeSeniority(value: string | null | undefined): Seniority | null {
  if (!value) return null;
  return detectSeniority(value) ?? (SENIORITY_ORDER.find((s) => value.toLowerCase().includes(s)) ?? null);
}

// ─── Heuristic extraction ────────────────────────────────────────────

export function extractRole(text: string, language: Language, lexicon: Lexicon = getLexicon()): string | null {
  const order: Language[] = language === 'es' ? ['es', 'en'] : ['en', 'es'];
  for (const lang of order) {
    for (const source of lexicon.rolePatterns[lang]) {
      // case-sensitive: titles are recognized by their capitalized words
      const match = new RegExp(source, 'u').exec(text);
      const role = cleanRole(match?.[1]);
      if (role) return role;
    }
  }
  return null;
}

export function extractRequirements(text: string, lexicon: Lexicon = getLexicon()): string[] {
  const keywords = lexicon.requirementKeywords.map((k) => k.toLowerCase());
  const lines: string[] = [];
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line.length <= MIN_REQUIREMENT_CHARS) continue;
    const isBullet = /^(?:[-*•]\s+|\d+[.)]\s+)/.test(line);
    const lower = line.toLowerCase();
    if (isBullet || keywords.some((k) => lower.includes(k))) {
      lines.push(line.replace(/^(?:[-*•]\s+|\d+[.)]\s+)/, ''));
    }
  }
  return dedupeTerms(lines).slice(0, MAX_REQUIREMENTS);
}

export function extractMinYears(text: string, lexicon: Lexicon = getLexicon()): number | null {
  for (const source of lexicon.experiencePatterns) {
    const match = new RegExp(source, 'iu').exec(text);
    if (match?.[1]) return Number.parseInt(match[1], 10);
  }
  return null;
}

export function extractIndustryTags(text: string, lexicon: Lexicon = getLexicon()): string[] {
  const lower = text.toLowerCase();
  return Object.entries(lexicon.industryTags)
    .filter(([, phrases]) => phrases.some((phrase) => phraseMatches(phrase, lower)))
    .map(([tag]) => tag);
}

/**
 * Keyword and pattern extraction over the raw text. Always produces a
 * signal, however thin.
 */
export class HeuristicExtractionStrategy implements ExtractionStrategy {
  readonly name = 'heuristic';
  readonly usesModel = false;

  constructor(private readonly lexicon: Lexicon = getLexicon()) {}

  buildSignal(text: string, language: Language): JobSignal {
    return {
      language,
      role: extractRole(text, language, this.lexicon),
      seniority: detectSeniority(text.slice(0, 2000), this.lexicon),
      technologies: mentionedTechnologies(text, this.lexicon),
      company: null,
      requirements: extractRequirements(text, this.lexicon),
      industryTags: extractIndustryTags(text, this.lexicon),
      minYearsExperience: extractMinYears(text, this.lexicon),
      source: 'heuristic',
    };
  }

  async extract(text: string, language: Language): Promise<ExtractionOutcome> {
    return { status: 'ok', signal: this.buildSignal(text, language) };
  }
}

// ─── Model extraction ────────────────────────────────────────────────

/**
 * Structured-extraction prompt through the adaptation service. The strict
 * variant is the same call with a prompt that tolerates less prose.
 */
export class ModelExtractionStrategy implements ExtractionStrategy {
  readonly name: string;
  readonly usesModel = true;

  constructor(
    private readonly service: AdaptationService,
    private readonly strict: boolean,
    private readonly heuristic: HeuristicExtractionStrategy = new HeuristicExtractionStrategy(),
  ) {
    this.name = strict ? 'model-strict' : 'model';
  }

  async extract(text: string, language: Language): Promise<ExtractionOutcome> {
    let fields: ExtractedFields;
    try {
      fields = await this.service.extract(text, this.strict);
    } catch (err) {
      if (err instanceof LLMUnavailableError) return { status: 'unavailable', reason: err.message };
      if (err instanceof MalformedCompletionError || err instanceof FidelityViolation) {
        return { status: 'malformed', reason: err.message };
      }
      throw err;
    }

    const role = cleanRole(fields.role);
    const technologies = dedupeTerms(fields.technologies);
    if (!role && technologies.length === 0) {
      return { status: 'malformed', reason: 'Extraction returned neither a role nor technologies' };
    }

    // Fields the prompt does not ask for come from the text itself.
    const fromText = this.heuristic.buildSignal(text, language);
    const requirements = dedupeTerms(fields.requirements.map((r) => r.trim())).slice(0, MAX_REQUIREMENTS);
    return {
      status: 'ok',
      signal: {
        language,
        role,
        seniority: normalizeSeniority(fields.seniority) ?? fromText.seniority,
        technologies,
        company: fields.company?.trim() || null,
        requirements: requirements.length > 0 ? requirements : fromText.requirements,
        industryTags: fromText.industryTags,
        minYearsExperience: fromText.minYearsExperience,
        source: 'model',
      },
    };
  }
}

// ─── Chain ───────────────────────────────────────────────────────────

/**
 * Tries each strategy in order and returns the first signal. Once a model
 * strategy reports the endpoint unavailable, later model strategies are
 * skipped. The last strategy must be one that never fails.
 */
export class ExtractionChain {
  constructor(
    private readonly strategies: readonly ExtractionStrategy[],
    private readonly log: Logger,
  ) {
    if (strategies.length === 0) {
      throw new Error('ExtractionChain needs at least one strategy');
    }
  }

  async run(text: string, language: Language): Promise<JobSignal> {
    let endpointDown = false;
    for (const strategy of this.strategies) {
      if (strategy.usesModel && endpointDown) continue;

      const outcome = await strategy.extract(text, language);
      if (outcome.status === 'ok') {
        this.log.debug({ strategy: strategy.name }, 'Job signal extracted');
        return outcome.signal;
      }
      if (outcome.status === 'unavailable') endpointDown = true;
      this.log.warn({ strategy: strategy.name, status: outcome.status, reason: outcome.reason }, 'Extraction strategy failed');
    }
    throw new Error(`No extraction strategy produced a signal (${this.strategies.map((s) => s.name).join(', ')})`);
  }
}

export function defaultExtractionChain(service: AdaptationService, log: Logger): ExtractionChain {
  const heuristic = new HeuristicExtractionStrategy();
  return new ExtractionChain(
    [new ModelExtractionStrategy(service, false, heuristic), new ModelExtractionStrategy(service, true, heuristic), heuristic],
    log,
  );
}
