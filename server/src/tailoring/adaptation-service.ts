import { z } from 'zod';
import type { LlmConfig } from '../config.js';
import { LLMUnavailableError, MalformedCompletionError } from '../lib/errors.js';
import { repairJSON } from '../lib/json-repair.js';
import type { CompletionProvider, CompletionResponse } from '../lib/llm-provider.js';
import logger, { createComponentLogger, errorMessage, type Logger } from '../lib/logger.js';
import { isTransientError, RetryExhaustedError, withRetry } from '../lib/retry.js';
import { AdaptationCache, fingerprint, type CacheStats } from './adaptation-cache.js';
import { guardBullets, FidelityViolation, restrictSkills } from './fidelity.js';
import {
  bulletsPrompt,
  closingPrompt,
  extractionPrompt,
  highlightPrompt,
  openingPrompt,
  rolePrompt,
  skillsPrompt,
  summaryPrompt,
  type Prompt,
} from './prompts.js';
import { cleanCompletionText, firstLine, splitBullets, splitList } from './text-cleanup.js';
import type { AdaptedContent, AdaptedSlot, JobSignal } from './types.js';

export type SlotKind = 'summary' | 'skills' | 'bullets' | 'role' | 'opening' | 'highlight' | 'closing';

const MAX_ROLE_TITLE_CHARS = 120;
const MAX_EXTRACTION_INPUT_CHARS = 12_000;

/** Slot kind encoded in a slot id; throws for ids no prompt exists for. */
export function slotKind(slotId: string): SlotKind {
  if (slotId === 'summary') return 'summary';
  if (slotId === 'skills') return 'skills';
  if (slotId === 'letter:opening') return 'opening';
  if (slotId === 'letter:closing') return 'closing';
  if (/^position:[^:]+:bullets$/.test(slotId)) return 'bullets';
  if (/^position:[^:]+:role$/.test(slotId)) return 'role';
  if (/^(?:position|project):[^:]+:highlight$/.test(slotId)) return 'highlight';
  throw new Error(`Unknown slot id "${slotId}"`);
}

const PROMPT_BUILDERS: Record<SlotKind, (source: string, signal: JobSignal) => Prompt> = {
  summary: summaryPrompt,
  skills: skillsPrompt,
  bullets: bulletsPrompt,
  role: rolePrompt,
  opening: openingPrompt,
  highlight: highlightPrompt,
  closing: closingPrompt,
};

export const ExtractedFieldsSchema = z
  .object({
    role: z.string().nullish(),
    seniority: z.string().nullish(),
    technologies: z.array(z.string()).default([]),
    company: z.string().nullish(),
    requirements: z.array(z.string()).default([]),
  })
  .passthrough();

export type ExtractedFields = z.infer<typeof ExtractedFieldsSchema>;

export interface AdaptOptions {
  /** Technologies a bullets slot may mention beyond those named in its source. */
  allowedTechnologies?: readonly string[];
  /** Skills a skills slot may return; defaults to the list in its source text. */
  allowedSkills?: readonly string[];
}

export interface SlotRequest extends AdaptOptions {
  slotId: string;
  sourceText: string;
  /** Returned unchanged when adaptation fails for any reason. */
  fallback: string;
}

export interface AdaptationServiceDeps {
  provider: CompletionProvider;
  config: Pick<LlmConfig, 'maxTokens' | 'retryBaseDelayMs'>;
  cache?: AdaptationCache;
  logger?: Logger;
}

/**
 * Client over one completion endpoint with a fingerprint cache in front.
 *
 * Provider failures are retried once and then surface as LLMUnavailableError;
 * empty or unusable output is MalformedCompletionError and is not retried.
 */
export class AdaptationService {
  private readonly provider: CompletionProvider;
  private readonly config: AdaptationServiceDeps['config'];
  private readonly cache: AdaptationCache;
  private readonly log: Logger;

  constructor(deps: AdaptationServiceDeps) {
    this.provider = deps.provider;
    this.config = deps.config;
    this.cache = deps.cache ?? new AdaptationCache();
    this.log = deps.logger ?? createComponentLogger('adaptation', logger);
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /** One completion call with a single retry on transient failures. */
  async complete(prompt: Prompt, maxTokens = this.config.maxTokens): Promise<string> {
    let response: CompletionResponse;
    try {
      response = await withRetry(
        () => this.provider.complete({ system: prompt.system, prompt: prompt.prompt, maxTokens }),
        {
          maxAttempts: 2,
          baseDelay: this.config.retryBaseDelayMs,
          shouldRetry: (err) => !(err instanceof MalformedCompletionError) && isTransientError(err),
          onRetry: (attempt, error) => {
            this.log.warn({ attempt, provider: this.provider.name, error: error.message }, 'Completion failed, retrying');
          },
        },
      );
    } catch (err) {
      // the endpoint answered, so a bad body is not an availability problem
      if (err instanceof MalformedCompletionError) throw err;
      const attempts = err instanceof RetryExhaustedError ? err.attempts : 1;
      throw new LLMUnavailableError(
        `Completion endpoint (${this.provider.name}) unavailable after ${attempts} attempt(s): ${errorMessage(err)}`,
        attempts,
        { cause: err },
      );
    }

    if (!response.text.trim()) {
      throw new MalformedCompletionError(`Completion endpoint (${this.provider.name}) returned an empty response`);
    }
    return response.text;
  }

  /** Structured fields from a job posting. Throws MalformedCompletionError on unusable JSON. */
  async extract(rawText: string, strict = false): Promise<ExtractedFields> {
    const text = await this.complete(extractionPrompt(rawText.slice(0, MAX_EXTRACTION_INPUT_CHARS), strict));
    const parsed = repairJSON(text);
    if (parsed === undefined) {
      throw new MalformedCompletionError('Extraction output is not JSON');
    }
    const result = ExtractedFieldsSchema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedCompletionError(
        `Extraction output failed validation: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      );
    }
    return result.data;
  }

  async adapt(slotId: string, sourceText: string, signal: JobSignal, options?: AdaptOptions): Promise<string> {
    return (await this.adaptWithProvenance(slotId, sourceText, signal, options)).text;
  }

  /**
   * Adapted text for one slot, from cache when the fingerprint was seen
   * before. Throws LLMUnavailableError, MalformedCompletionError or
   * FidelityViolation; nothing is cached on failure.
   */
  async adaptWithProvenance(
    slotId: string,
    sourceText: string,
    signal: JobSignal,
    options: AdaptOptions = {},
  ): Promise<{ text: string; cached: boolean }> {
    const kind = slotKind(slotId);
    const key = fingerprint(slotId, sourceText, signal);

    const { value, cached } = await this.cache.getOrCompute(key, async () => {
      const raw = await this.complete(PROMPT_BUILDERS[kind](sourceText, signal));
      return this.postProcess(kind, raw, sourceText, options);
    });

    this.log.debug({ slotId, cached }, 'Slot adapted');
    return { text: value, cached };
  }

  /**
   * Adapt every slot concurrently. A failing slot gets its fallback text;
   * the other slots are unaffected.
   */
  async adaptSlots(requests: readonly SlotRequest[], signal: JobSignal): Promise<AdaptedContent> {
    const entries = await Promise.all(
      requests.map(async (request): Promise<[string, AdaptedSlot]> => {
        try {
          const { text, cached } = await this.adaptWithProvenance(request.slotId, request.sourceText, signal, request);
          return [request.slotId, { text, provenance: cached ? 'cached' : 'adapted' }];
        } catch (err) {
          this.log.warn(
            { slotId: request.slotId, reason: err instanceof Error ? err.name : 'Error', error: errorMessage(err) },
            'Slot adaptation failed, using original text',
          );
          return [request.slotId, { text: request.fallback, provenance: 'fallback' }];
        }
      }),
    );
    return new Map(entries);
  }

  private postProcess(kind: SlotKind, raw: string, sourceText: string, options: AdaptOptions): string {
    switch (kind) {
      case 'role': {
        const title = firstLine(raw);
        if (!title || title.length > MAX_ROLE_TITLE_CHARS) {
          throw new MalformedCompletionError('Role translation is empty or too long');
        }
        return title;
      }
      case 'skills': {
        const allowed = options.allowedSkills ?? splitList(sourceText);
        const skills = restrictSkills(splitList(raw), allowed);
        if (skills.length === 0) {
          throw new FidelityViolation('No returned skill is present in the profile');
        }
        return skills.join(', ');
      }
      case 'bullets': {
        const bullets = splitBullets(raw);
        if (bullets.length === 0) {
          throw new MalformedCompletionError('No bullets in completion');
        }
        return guardBullets(bullets, options.allowedTechnologies ?? [], sourceText).join('\n');
      }
      case 'summary':
      case 'opening':
      case 'highlight':
      case 'closing': {
        const text = cleanCompletionText(raw);
        if (!text) {
          throw new MalformedCompletionError(`Completion for ${kind} is empty after clean-up`);
        }
        return text;
      }
    }
  }
}
